import { GITHUB } from "../config.js";
import { debug } from "../logger.js";
import {
  CommentSummary,
  IssueSummary,
  JsonRecord,
  JsonValue,
  OwnerType,
  PullRequestSummary,
  RepositoryDescriptor
} from "../types.js";
import { isRecord, readBoolean, readNumber, readRecord, readString } from "../utils/json.js";
import { buildPreview, extractIssueNumber } from "../utils/text.js";
import { GitHubClient } from "./client.js";

/**
 * The part of {@link GitHubClient} the fetchers rely on.
 */
export type ListingClient = Pick<GitHubClient, "list" | "pages">;

export interface ListRepositoriesOptions {
  readonly ownerType?: OwnerType;
  readonly includeForks?: boolean;
}

function records(items: readonly JsonValue[]): JsonRecord[] {
  return items.filter(isRecord);
}

function authorOf(raw: JsonRecord): string {
  return readString(readRecord(raw, "user") ?? {}, "login") ?? "unknown";
}

function toRepository(raw: JsonRecord, owner: string): RepositoryDescriptor | null {
  const name = readString(raw, "name");
  if (!name) {
    return null;
  }
  return {
    name,
    fullName: readString(raw, "full_name") ?? `${owner}/${name}`,
    url: readString(raw, "html_url") ?? `https://github.com/${owner}/${name}`,
    description: readString(raw, "description"),
    stars: readNumber(raw, "stargazers_count") ?? 0,
    forks: readNumber(raw, "forks_count") ?? 0,
    isFork: readBoolean(raw, "fork") ?? false,
    isArchived: readBoolean(raw, "archived") ?? false,
    isPrivate: readBoolean(raw, "private") ?? false
  };
}

export function toIssue(raw: JsonRecord): IssueSummary | null {
  const number = readNumber(raw, "number");
  const createdAt = readString(raw, "created_at");
  if (number === undefined || !createdAt) {
    return null;
  }
  return {
    number,
    title: readString(raw, "title") ?? "",
    author: authorOf(raw),
    createdAt,
    updatedAt: readString(raw, "updated_at"),
    url: readString(raw, "html_url") ?? ""
  };
}

export function toComment(raw: JsonRecord): CommentSummary | null {
  const createdAt = readString(raw, "created_at");
  if (!createdAt) {
    return null;
  }
  return {
    issueNumber: extractIssueNumber(readString(raw, "issue_url")),
    author: authorOf(raw),
    createdAt,
    url: readString(raw, "html_url") ?? "",
    previewText: buildPreview(readString(raw, "body"))
  };
}

export function toPullRequest(raw: JsonRecord): PullRequestSummary | null {
  const number = readNumber(raw, "number");
  const createdAt = readString(raw, "created_at");
  if (number === undefined || !createdAt) {
    return null;
  }
  return {
    number,
    title: readString(raw, "title") ?? "",
    author: authorOf(raw),
    createdAt,
    url: readString(raw, "html_url") ?? "",
    state: readString(raw, "state")
  };
}

function notNull<T>(value: T | null): value is T {
  return value !== null;
}

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}

/**
 * List the owner's repositories in API order. Forks are left out unless requested.
 */
export async function listRepositories(
  client: ListingClient,
  owner: string,
  options: ListRepositoriesOptions = {}
): Promise<RepositoryDescriptor[]> {
  const ownerType = options.ownerType ?? GITHUB.OWNER_TYPE;
  const includeForks = options.includeForks ?? GITHUB.INCLUDE_FORKS;
  const endpoint =
    ownerType === "org"
      ? `/orgs/${encodeURIComponent(owner)}/repos?type=all&per_page=${GITHUB.PER_PAGE}`
      : `/users/${encodeURIComponent(owner)}/repos?type=owner&per_page=${GITHUB.PER_PAGE}`;
  const raw = await client.list(endpoint);
  const repos = records(raw)
    .map(item => toRepository(item, owner))
    .filter(notNull);
  const kept = includeForks ? repos : repos.filter(repo => !repo.isFork);
  debug(`Listed ${repos.length} repositories for ${owner}, kept ${kept.length}.`);
  return kept;
}

/**
 * Issues opened or updated since the cutoff, with pull requests removed.
 */
export async function fetchIssuesSince(
  client: ListingClient,
  owner: string,
  repo: string,
  cutoff: string
): Promise<IssueSummary[]> {
  const raw = await client.list(
    `${repoPath(owner, repo)}/issues?state=all&since=${encodeURIComponent(cutoff)}&per_page=${GITHUB.PER_PAGE}`
  );
  return records(raw)
    .filter(item => item.pull_request === undefined || item.pull_request === null)
    .map(toIssue)
    .filter(notNull);
}

export async function fetchCommentsSince(
  client: ListingClient,
  owner: string,
  repo: string,
  cutoff: string
): Promise<CommentSummary[]> {
  const raw = await client.list(
    `${repoPath(owner, repo)}/issues/comments?since=${encodeURIComponent(cutoff)}&per_page=${GITHUB.PER_PAGE}`
  );
  return records(raw).map(toComment).filter(notNull);
}

/**
 * Pull requests created at or after the cutoff.
 *
 * The listing is sorted newest first, so paging stops at the first older entry.
 */
export async function fetchPullRequestsSince(
  client: ListingClient,
  owner: string,
  repo: string,
  cutoff: string
): Promise<PullRequestSummary[]> {
  const cutoffMs = Date.parse(cutoff);
  const pulls: PullRequestSummary[] = [];
  const sequence = client.pages(
    `${repoPath(owner, repo)}/pulls?state=all&sort=created&direction=desc&per_page=${GITHUB.PER_PAGE}`
  );
  for await (const item of sequence) {
    const pull = isRecord(item) ? toPullRequest(item) : null;
    if (!pull) {
      continue;
    }
    if (Date.parse(pull.createdAt) < cutoffMs) {
      break;
    }
    pulls.push(pull);
  }
  return pulls;
}
