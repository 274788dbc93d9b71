const PREVIEW_LENGTH = 100;

/**
 * Collapse line breaks and runs of whitespace into single spaces and cut the
 * result to 100 characters, appending "..." when something was cut.
 */
export function buildPreview(body: string | undefined, maxLength: number = PREVIEW_LENGTH): string {
  const collapsed = (body ?? "").replace(/\s+/g, " ").trim();
  if (collapsed.length <= maxLength) {
    return collapsed;
  }
  return `${collapsed.slice(0, maxLength)}...`;
}

/**
 * Read the owning issue number from a URL ending in `/issues/<digits>`.
 */
export function extractIssueNumber(url: string | undefined): number | null {
  const match = url ? /\/issues\/(\d+)$/.exec(url) : null;
  return match ? Number.parseInt(match[1], 10) : null;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
