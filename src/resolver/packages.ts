import { AuthError, describeError } from "../errors.js";
import { findPackage, findPackagesByAuthor } from "../gallery/api.js";
import { debug, warn } from "../logger.js";
import { GalleryPackage, PackageOutcome, PackageSnapshot, PackageStat, Snapshot } from "../types.js";

/**
 * Download delta against the prior snapshot.
 *
 * No prior entry, or an entry without a download count, is a baseline: the
 * delta is 0 whatever the current count. A recorded count, zero included,
 * yields the plain difference.
 */
export function downloadDelta(current: number, prior?: PackageSnapshot): number {
  if (prior?.downloads === undefined) {
    return 0;
  }
  return current - prior.downloads;
}

export function toPackageStat(pkg: GalleryPackage, prior?: PackageSnapshot): PackageStat {
  const delta = downloadDelta(pkg.downloadCount, prior);
  return {
    name: pkg.name,
    version: pkg.version,
    totalDownloads: pkg.downloadCount,
    downloadDelta: delta,
    publishedDate: pkg.published,
    url: pkg.url,
    description: pkg.description,
    hasNewDownloads: delta > 0
  };
}

/**
 * Stats for every package in registry order.
 */
export function resolvePackageStats(packages: readonly GalleryPackage[], snapshot: Snapshot): PackageStat[] {
  return packages.map(pkg => toPackageStat(pkg, snapshot.packages[pkg.name]));
}

export interface PackageSource {
  readonly author?: string;
  readonly names?: readonly string[];
}

export interface GalleryLookup {
  readonly byAuthor: (author: string) => Promise<GalleryPackage[]>;
  readonly byName: (name: string) => Promise<GalleryPackage | null>;
}

const defaultLookup: GalleryLookup = {
  byAuthor: author => findPackagesByAuthor(author),
  byName: name => findPackage(name)
};

/**
 * Fetch the packages named by author and/or explicit names, then compute stats.
 *
 * A registry failure is returned as a failed outcome rather than an empty list.
 */
export async function collectPackageStats(
  source: PackageSource,
  snapshot: Snapshot,
  lookup: GalleryLookup = defaultLookup
): Promise<PackageOutcome> {
  const label = [source.author ? `author ${source.author}` : "", ...(source.names ?? [])].filter(Boolean).join(", ");
  try {
    const found: GalleryPackage[] = source.author ? await lookup.byAuthor(source.author) : [];
    const seen = new Set(found.map(pkg => pkg.name.toLowerCase()));
    for (const name of source.names ?? []) {
      if (seen.has(name.toLowerCase())) {
        continue;
      }
      const pkg = await lookup.byName(name);
      if (pkg) {
        found.push(pkg);
        seen.add(pkg.name.toLowerCase());
      } else {
        debug(`Package ${name} not found in registry.`);
      }
    }
    return { ok: true, stats: resolvePackageStats(found, snapshot) };
  } catch (cause) {
    if (cause instanceof AuthError) {
      throw cause;
    }
    warn(`Package lookup failed for ${label}: ${describeError(cause)}`);
    return { ok: false, source: label, error: describeError(cause) };
  }
}
