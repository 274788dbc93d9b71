import * as dotenv from "dotenv";

dotenv.config();

function readInt(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  return raw === undefined ? fallback : ["true", "1", "yes"].includes(raw.toLowerCase());
}

function readList(name: string): readonly string[] {
  return (process.env[name] ?? "")
    .split(",")
    .map(item => item.trim())
    .filter(Boolean);
}

/**
 * Source-control host settings.
 *
 * `TOKEN` is the ambient credential; an explicit per-call token always wins over it.
 */
export const GITHUB = {
  API_BASE: process.env.GITHUB_API_URL ?? "https://api.github.com",
  API_VERSION: "2022-11-28",
  TOKEN: process.env.GITHUB_TOKEN ?? "",
  OWNER: process.env.GITHUB_OWNER ?? "",
  OWNER_TYPE: process.env.GITHUB_OWNER_TYPE === "org" ? "org" : "user",
  INCLUDE_FORKS: readFlag("INCLUDE_FORKS", false),
  PER_PAGE: 100
} as const;

/**
 * Package registry (PowerShell Gallery OData feed) settings.
 */
export const GALLERY = {
  API_BASE: process.env.PSGALLERY_API_URL ?? "https://www.powershellgallery.com/api/v2",
  SITE_BASE: "https://www.powershellgallery.com/packages",
  AUTHOR: process.env.PSGALLERY_AUTHOR ?? "",
  PACKAGES: readList("PSGALLERY_PACKAGES")
} as const;

/**
 * Network-level configuration.
 *
 * Invariant: `CONCURRENCY` must be positive.
 */
export const NET = {
  TIMEOUT: readInt("HTTP_TIMEOUT", 30000),
  CONCURRENCY: Math.max(1, readInt("ACTIVITY_CONCURRENCY", 1)),
  RATE_LIMIT_THRESHOLD: readInt("RATE_LIMIT_THRESHOLD", 5)
} as const;

export const STATE = {
  PATH: process.env.ACTIVITY_STATE_PATH ?? "state/activity-state.json"
} as const;

export const REPORT = {
  SINCE_HOURS: readInt("ACTIVITY_SINCE_HOURS", 24),
  OUTPUT_DIR: process.env.REPORT_DIR ?? "reports"
} as const;
