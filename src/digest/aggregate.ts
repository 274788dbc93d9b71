import { ActivityRecord, PackageStat, Summary } from "../types.js";

/**
 * Fold activity records and package stats into run totals.
 *
 * Only records with activity and packages with new downloads contribute.
 */
export function summarize(records: readonly ActivityRecord[], packages: readonly PackageStat[] = []): Summary {
  const active = records.filter(record => record.hasActivity);
  const growing = packages.filter(pkg => pkg.hasNewDownloads);
  return {
    activeCount: active.length,
    newIssues: active.reduce((sum, record) => sum + record.newIssues.length, 0),
    newComments: active.reduce((sum, record) => sum + record.newComments.length, 0),
    newPullRequests: active.reduce((sum, record) => sum + record.newPullRequests.length, 0),
    starsGained: active.reduce((sum, record) => sum + record.starsDelta, 0),
    downloadsGained: growing.reduce((sum, pkg) => sum + pkg.downloadDelta, 0)
  };
}
