import fs from "fs-extra";
import path from "node:path";
import sanitize from "sanitize-filename";
import { ActivityRecord, Digest, PackageStat } from "../types.js";
import { escapeHtml } from "../utils/text.js";

function link(url: string, label: string): string {
  return url ? `<a href="${escapeHtml(url)}">${escapeHtml(label)}</a>` : escapeHtml(label);
}

function list(items: readonly string[]): string {
  return items.length === 0 ? "" : `<ul>${items.map(item => `<li>${item}</li>`).join("")}</ul>`;
}

function repositorySection(record: ActivityRecord): string {
  const entries = [
    ...record.newIssues.map(issue => `New issue ${link(issue.url, `#${issue.number} ${issue.title}`)} by ${escapeHtml(issue.author)}`),
    ...record.updatedIssues.map(issue => `Updated issue ${link(issue.url, `#${issue.number} ${issue.title}`)}`),
    ...record.newPullRequests.map(pull => `New pull request ${link(pull.url, `#${pull.number} ${pull.title}`)} by ${escapeHtml(pull.author)}`),
    ...record.newComments.map(
      comment =>
        `${link(comment.url, comment.issueNumber === null ? "Comment" : `Comment on #${comment.issueNumber}`)} by ${escapeHtml(comment.author)}: ${escapeHtml(comment.previewText)}`
    )
  ];
  return [
    `<section class="repo">`,
    `<h2>${link(record.url, record.name)}</h2>`,
    `<p>Stars ${record.starsNow} (${record.starsDelta >= 0 ? "+" : ""}${record.starsDelta}), forks ${record.forksNow} (${record.forksDelta >= 0 ? "+" : ""}${record.forksDelta})</p>`,
    list(entries),
    `</section>`
  ].join("\n");
}

function packageRow(pkg: PackageStat): string {
  return `<tr><td>${link(pkg.url, pkg.name)}</td><td>${escapeHtml(pkg.version)}</td><td>${pkg.totalDownloads}</td><td>+${pkg.downloadDelta}</td></tr>`;
}

/**
 * Standalone HTML page for a digest. Every interpolated value is escaped.
 */
export function renderHtmlReport(digest: Digest): string {
  const { summary } = digest;
  const active = digest.repositories.filter(record => record.hasActivity);
  const growing = digest.packages.filter(pkg => pkg.hasNewDownloads);
  const body = [
    `<h1>Activity for ${escapeHtml(digest.owner)}</h1>`,
    `<p>Since ${escapeHtml(digest.cutoff)} &middot; generated ${escapeHtml(digest.generatedAt)}</p>`,
    `<p>${summary.activeCount} active repositories, ${summary.newIssues} new issues, ${summary.newComments} comments, ${summary.newPullRequests} pull requests, ${summary.starsGained} stars gained, ${summary.downloadsGained} downloads gained</p>`,
    ...active.map(repositorySection),
    digest.failures.length > 0
      ? `<h2>Failed repositories</h2>${list(digest.failures.map(failure => `${link(failure.url, failure.name)}: ${escapeHtml(failure.error)}`))}`
      : "",
    growing.length > 0
      ? `<h2>Packages</h2><table><tr><th>Package</th><th>Version</th><th>Downloads</th><th>New</th></tr>${growing.map(packageRow).join("")}</table>`
      : "",
    digest.packageFailure ? `<p class="error">Package lookup failed: ${escapeHtml(digest.packageFailure)}</p>` : ""
  ].filter(Boolean);
  return [
    "<!DOCTYPE html>",
    `<html lang="en"><head><meta charset="utf-8"><title>Activity for ${escapeHtml(digest.owner)}</title></head>`,
    `<body>`,
    ...body,
    `</body></html>`
  ].join("\n");
}

export function reportFileName(owner: string, generatedAt: string): string {
  return sanitize(`${owner}-activity-${generatedAt.slice(0, 10)}.html`, { replacement: "_" });
}

/**
 * Write the report under `directory` and return the file path.
 */
export async function writeHtmlReport(directory: string, digest: Digest): Promise<string> {
  const target = path.join(directory, reportFileName(digest.owner, digest.generatedAt));
  await fs.outputFile(target, renderHtmlReport(digest), "utf8");
  return target;
}
