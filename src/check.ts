import { summarize } from "./digest/aggregate.js";
import { listRepositories, ListingClient } from "./github/api.js";
import { info, warn } from "./logger.js";
import { resolveActivity } from "./resolver/activity.js";
import { collectPackageStats, GalleryLookup, PackageSource } from "./resolver/packages.js";
import { loadSnapshot, saveSnapshot } from "./state/store.js";
import {
  ActivityRecord,
  Digest,
  JsonRecord,
  OwnerType,
  PackageOutcome,
  PackageStat,
  RepositoryFailure,
  RepositoryOutcome
} from "./types.js";
import { computeCutoff, toIsoSeconds } from "./utils/time.js";

export interface CheckOptions {
  readonly owner: string;
  readonly ownerType: OwnerType;
  readonly includeForks: boolean;
  readonly sinceHours: number;
  readonly cutoff?: string;
  readonly sinceLastCheck?: boolean;
  readonly statePath: string;
  readonly packages: PackageSource;
  readonly concurrency: number;
  readonly dryRun?: boolean;
  readonly now?: Date;
}

export interface CheckDependencies {
  readonly client: ListingClient;
  readonly gallery?: GalleryLookup;
}

/**
 * Snapshot patch for a finished run. Failed repositories are left out so
 * their previous counters survive the merge.
 */
export function buildStatePatch(
  owner: string,
  checkedAt: string,
  outcomes: readonly RepositoryOutcome[],
  packages: readonly PackageStat[]
): JsonRecord {
  const repos = Object.fromEntries(
    outcomes.flatMap(outcome =>
      outcome.ok ? [[outcome.record.name, { stars: outcome.record.starsNow, forks: outcome.record.forksNow }] as const] : []
    )
  );
  const psgallery = Object.fromEntries(packages.map(pkg => [pkg.name, { downloads: pkg.totalDownloads }] as const));
  return { owner, last_check: checkedAt, repos, psgallery };
}

export function buildDigest(
  owner: string,
  cutoff: string,
  generatedAt: string,
  outcomes: readonly RepositoryOutcome[],
  packages: PackageOutcome
): Digest {
  const repositories: ActivityRecord[] = [];
  const failures: RepositoryFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      repositories.push(outcome.record);
    } else {
      failures.push({ name: outcome.name, url: outcome.url, error: outcome.error, status: outcome.status });
    }
  }
  const stats = packages.ok ? packages.stats : [];
  return {
    owner,
    cutoff,
    generatedAt,
    repositories,
    failures,
    packages: stats,
    packageFailure: packages.ok ? undefined : packages.error,
    summary: summarize(repositories, stats)
  };
}

/**
 * One polling run: load state once, compute every delta, then save once.
 */
export async function runCheck(options: CheckOptions, deps: CheckDependencies): Promise<Digest> {
  const now = options.now ?? new Date();
  const checkedAt = toIsoSeconds(now);
  const snapshot = await loadSnapshot(options.statePath, options.owner);
  const fromLastCheck = options.sinceLastCheck ? (snapshot.lastCheck ?? undefined) : undefined;
  if (options.sinceLastCheck && !fromLastCheck && !options.cutoff) {
    warn(`No previous check recorded; falling back to the last ${options.sinceHours} hours.`);
  }
  const cutoff = computeCutoff(options.sinceHours, now, options.cutoff ?? fromLastCheck);
  info(`Checking activity for ${options.owner} since ${cutoff}.`);

  const repos = await listRepositories(deps.client, options.owner, {
    ownerType: options.ownerType,
    includeForks: options.includeForks
  });
  info(`Found ${repos.length} repositories.`);
  const outcomes = await resolveActivity(deps.client, options.owner, repos, snapshot, cutoff, {
    concurrency: options.concurrency
  });

  const wantsPackages = Boolean(options.packages.author) || (options.packages.names?.length ?? 0) > 0;
  const packages: PackageOutcome = wantsPackages
    ? await collectPackageStats(options.packages, snapshot, deps.gallery)
    : { ok: true, stats: [] };
  if (packages.ok && wantsPackages) {
    info(`Resolved ${packages.stats.length} packages.`);
  }

  const digest = buildDigest(options.owner, cutoff, checkedAt, outcomes, packages);
  if (options.dryRun) {
    info("Dry run: state left unchanged.");
  } else {
    await saveSnapshot(options.statePath, buildStatePatch(options.owner, checkedAt, outcomes, digest.packages));
    info(`State saved to ${options.statePath}.`);
  }
  return digest;
}
