import chalk from "chalk";
import { ActivityRecord, Digest } from "../types.js";

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function repositoryLines(record: ActivityRecord): string[] {
  const lines = [
    `${chalk.bold(record.name)}  ★ ${record.starsNow} (${signed(record.starsDelta)})  forks ${record.forksNow} (${signed(record.forksDelta)})`
  ];
  for (const issue of record.newIssues) {
    lines.push(`  new issue #${issue.number} ${issue.title} by ${issue.author}`);
  }
  for (const issue of record.updatedIssues) {
    lines.push(`  updated issue #${issue.number} ${issue.title}`);
  }
  for (const pull of record.newPullRequests) {
    lines.push(`  new pull request #${pull.number} ${pull.title} by ${pull.author}`);
  }
  for (const comment of record.newComments) {
    const target = comment.issueNumber === null ? "" : ` on #${comment.issueNumber}`;
    lines.push(`  comment${target} by ${comment.author}: ${comment.previewText}`);
  }
  return lines;
}

/**
 * Plain-text run summary for the terminal.
 */
export function renderConsoleSummary(digest: Digest): string {
  const { summary } = digest;
  const lines: string[] = [
    chalk.cyan(`Activity for ${digest.owner} since ${digest.cutoff}`),
    `${summary.activeCount} active repositories, ${summary.newIssues} new issues, ${summary.newComments} comments, ` +
      `${summary.newPullRequests} pull requests, ${signed(summary.starsGained)} stars, ${signed(summary.downloadsGained)} downloads`
  ];
  for (const record of digest.repositories.filter(item => item.hasActivity)) {
    lines.push(...repositoryLines(record));
  }
  for (const failure of digest.failures) {
    lines.push(chalk.red(`${failure.name}: fetch failed (${failure.error})`));
  }
  for (const pkg of digest.packages.filter(item => item.hasNewDownloads)) {
    lines.push(`${chalk.bold(pkg.name)} ${pkg.version}  downloads ${pkg.totalDownloads} (${signed(pkg.downloadDelta)})`);
  }
  if (digest.packageFailure) {
    lines.push(chalk.red(`Package lookup failed (${digest.packageFailure})`));
  }
  return lines.join("\n");
}
