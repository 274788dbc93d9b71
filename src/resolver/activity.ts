import pLimit from "p-limit";
import { NET } from "../config.js";
import { ApiError, AuthError, describeError } from "../errors.js";
import { fetchCommentsSince, fetchIssuesSince, fetchPullRequestsSince, ListingClient } from "../github/api.js";
import { debug, warn } from "../logger.js";
import {
  ActivityRecord,
  EntitySnapshot,
  IssueSummary,
  RepositoryDescriptor,
  RepositoryOutcome,
  Snapshot
} from "../types.js";

export interface CounterDelta {
  readonly starsDelta: number;
  readonly forksDelta: number;
}

/**
 * Star and fork deltas against the prior snapshot.
 *
 * A repository never observed, or a field missing from its entry, counts as
 * unchanged rather than as growth from zero.
 */
export function counterDelta(repo: Pick<RepositoryDescriptor, "stars" | "forks">, prior?: EntitySnapshot): CounterDelta {
  const prevStars = prior?.stars ?? repo.stars;
  const prevForks = prior?.forks ?? repo.forks;
  return {
    starsDelta: repo.stars - prevStars,
    forksDelta: repo.forks - prevForks
  };
}

/**
 * Split issues into those created at or after the cutoff and those created
 * earlier but touched since.
 */
export function partitionIssues(
  issues: readonly IssueSummary[],
  cutoff: string
): { readonly created: IssueSummary[]; readonly updated: IssueSummary[] } {
  const cutoffMs = Date.parse(cutoff);
  const created: IssueSummary[] = [];
  const updated: IssueSummary[] = [];
  for (const issue of issues) {
    if (Date.parse(issue.createdAt) >= cutoffMs) {
      created.push(issue);
    } else {
      updated.push(issue);
    }
  }
  return { created, updated };
}

export function hasActivity(record: Omit<ActivityRecord, "hasActivity">): boolean {
  return (
    record.newIssues.length > 0 ||
    record.newComments.length > 0 ||
    record.newPullRequests.length > 0 ||
    record.updatedIssues.length > 0 ||
    record.starsDelta !== 0 ||
    record.forksDelta !== 0
  );
}

/**
 * Build the activity record for one repository. API failures propagate.
 */
export async function resolveRepositoryActivity(
  client: ListingClient,
  owner: string,
  repo: RepositoryDescriptor,
  snapshot: Snapshot,
  cutoff: string
): Promise<ActivityRecord> {
  const { starsDelta, forksDelta } = counterDelta(repo, snapshot.entities[repo.name]);
  const issues = await fetchIssuesSince(client, owner, repo.name, cutoff);
  const { created, updated } = partitionIssues(issues, cutoff);
  const comments = await fetchCommentsSince(client, owner, repo.name, cutoff);
  const pulls = await fetchPullRequestsSince(client, owner, repo.name, cutoff);

  const base = {
    name: repo.name,
    url: repo.url,
    starsNow: repo.stars,
    starsDelta,
    forksNow: repo.forks,
    forksDelta,
    newIssues: created,
    newComments: comments,
    newPullRequests: pulls,
    updatedIssues: updated
  };
  return Object.freeze({ ...base, hasActivity: hasActivity(base) });
}

export interface ResolveOptions {
  readonly concurrency?: number;
}

/**
 * Resolve every repository, one outcome per repository in listing order.
 *
 * A failed repository becomes an error-bearing outcome so it is not mistaken
 * for a quiet one. Credential failures abort the whole run.
 */
export async function resolveActivity(
  client: ListingClient,
  owner: string,
  repos: readonly RepositoryDescriptor[],
  snapshot: Snapshot,
  cutoff: string,
  options: ResolveOptions = {}
): Promise<RepositoryOutcome[]> {
  const limit = pLimit(Math.max(1, options.concurrency ?? NET.CONCURRENCY));
  return Promise.all(
    repos.map(repo =>
      limit(async (): Promise<RepositoryOutcome> => {
        try {
          const record = await resolveRepositoryActivity(client, owner, repo, snapshot, cutoff);
          debug(`Resolved ${repo.name}: ${record.hasActivity ? "active" : "quiet"}.`);
          return { ok: true, record };
        } catch (cause) {
          if (cause instanceof AuthError) {
            throw cause;
          }
          warn(`Activity fetch failed for ${repo.name}: ${describeError(cause)}`);
          return {
            ok: false,
            name: repo.name,
            url: repo.url,
            error: describeError(cause),
            status: cause instanceof ApiError ? cause.status : undefined
          };
        }
      })
    )
  );
}
