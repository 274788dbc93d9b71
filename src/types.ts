/**
 * JSON value as decoded from an API payload or the state file.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

export type JsonRecord = { readonly [key: string]: JsonValue };

export type OwnerType = "user" | "org";

/**
 * Last known counters for one repository.
 *
 * Either field may be missing in state written by older versions; a missing
 * field defaults to the currently observed value when deltas are computed.
 */
export interface EntitySnapshot {
  readonly stars?: number;
  readonly forks?: number;
}

/**
 * Last known counters for one registry package.
 */
export interface PackageSnapshot {
  readonly downloads?: number;
}

/**
 * Persisted "last known values" for a single owner.
 *
 * Invariant: all three keys are always present; an absent map key means the
 * entity was never observed.
 */
export interface Snapshot {
  readonly lastCheck: string | null;
  readonly entities: { readonly [name: string]: EntitySnapshot };
  readonly packages: { readonly [name: string]: PackageSnapshot };
}

/**
 * On-disk layout of the state file.
 */
export interface StateFile {
  readonly owner?: string;
  readonly last_check?: string | null;
  readonly repos?: { readonly [name: string]: EntitySnapshot };
  readonly psgallery?: { readonly [name: string]: PackageSnapshot };
}

/**
 * Repository as returned by the owner listing, with counters observed now.
 */
export interface RepositoryDescriptor {
  readonly name: string;
  readonly fullName: string;
  readonly url: string;
  readonly description?: string;
  readonly stars: number;
  readonly forks: number;
  readonly isFork: boolean;
  readonly isArchived: boolean;
  readonly isPrivate: boolean;
}

export interface IssueSummary {
  readonly number: number;
  readonly title: string;
  readonly author: string;
  readonly createdAt: string;
  readonly updatedAt?: string;
  readonly url: string;
}

/**
 * Issue or pull request comment.
 *
 * @property issueNumber - Owning issue, parsed from the comment's issue URL; null when absent.
 * @property previewText - Whitespace-collapsed body, at most 100 characters plus "...".
 */
export interface CommentSummary {
  readonly issueNumber: number | null;
  readonly author: string;
  readonly createdAt: string;
  readonly url: string;
  readonly previewText: string;
}

export interface PullRequestSummary {
  readonly number: number;
  readonly title: string;
  readonly author: string;
  readonly createdAt: string;
  readonly url: string;
  readonly state?: string;
}

/**
 * Per-repository delta for one run. Built once, never mutated.
 */
export interface ActivityRecord {
  readonly name: string;
  readonly url: string;
  readonly starsNow: number;
  readonly starsDelta: number;
  readonly forksNow: number;
  readonly forksDelta: number;
  readonly newIssues: readonly IssueSummary[];
  readonly newComments: readonly CommentSummary[];
  readonly newPullRequests: readonly PullRequestSummary[];
  readonly updatedIssues: readonly IssueSummary[];
  readonly hasActivity: boolean;
}

/**
 * A repository whose activity could not be fetched. Kept apart from quiet repositories.
 */
export interface RepositoryFailure {
  readonly name: string;
  readonly url: string;
  readonly error: string;
  readonly status?: number;
}

export type RepositoryOutcome =
  | { readonly ok: true; readonly record: ActivityRecord }
  | ({ readonly ok: false } & RepositoryFailure);

/**
 * Latest published version of a registry package.
 */
export interface GalleryPackage {
  readonly name: string;
  readonly version: string;
  readonly downloadCount: number;
  readonly published?: string;
  readonly description?: string;
  readonly url: string;
}

export interface PackageStat {
  readonly name: string;
  readonly version: string;
  readonly totalDownloads: number;
  readonly downloadDelta: number;
  readonly publishedDate?: string;
  readonly url: string;
  readonly description?: string;
  readonly hasNewDownloads: boolean;
}

export type PackageOutcome =
  | { readonly ok: true; readonly stats: readonly PackageStat[] }
  | { readonly ok: false; readonly source: string; readonly error: string };

export interface Summary {
  readonly activeCount: number;
  readonly newIssues: number;
  readonly newComments: number;
  readonly newPullRequests: number;
  readonly starsGained: number;
  readonly downloadsGained: number;
}

/**
 * Everything a renderer needs for one run.
 */
export interface Digest {
  readonly owner: string;
  readonly cutoff: string;
  readonly generatedAt: string;
  readonly repositories: readonly ActivityRecord[];
  readonly failures: readonly RepositoryFailure[];
  readonly packages: readonly PackageStat[];
  readonly packageFailure?: string;
  readonly summary: Summary;
}
