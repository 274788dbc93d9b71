import { GALLERY } from "../config.js";
import { errorForStatus } from "../errors.js";
import { debug } from "../logger.js";
import { GalleryPackage, JsonRecord, JsonValue } from "../types.js";
import { send } from "../utils/http.js";
import { asList, isRecord, readBoolean, readNumber, readRecord, readString } from "../utils/json.js";

const MAX_FEED_PAGES = 20;

function quoteOData(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

interface FeedPage {
  readonly entries: readonly JsonRecord[];
  readonly next?: string;
}

/**
 * Read entries from an OData v2 verbose JSON answer (`d.results`, `d` or `value`).
 */
function toFeedPage(data: JsonValue): FeedPage {
  if (!isRecord(data)) {
    return { entries: [] };
  }
  const envelope = readRecord(data, "d");
  const list = envelope ? asList(envelope.results) : asList(data.d).length > 0 ? asList(data.d) : asList(data.value);
  const entries = list.filter(isRecord);
  const next = envelope ? readString(envelope, "__next") : readString(data, "odata.nextLink");
  return { entries, next };
}

function toGalleryPackage(raw: JsonRecord): GalleryPackage | null {
  const name = readString(raw, "Id");
  const version = readString(raw, "Version");
  if (!name || !version) {
    return null;
  }
  return {
    name,
    version,
    downloadCount: readNumber(raw, "DownloadCount") ?? 0,
    published: readString(raw, "Published"),
    description: readString(raw, "Description"),
    url: readString(raw, "GalleryDetailsUrl") ?? `${GALLERY.SITE_BASE}/${encodeURIComponent(name)}`
  };
}

/**
 * Collapse the feed to one entry per package id, keeping the latest version.
 * Feed order of first appearance is preserved.
 */
function latestPerPackage(entries: readonly JsonRecord[]): GalleryPackage[] {
  const byName = new Map<string, { readonly pkg: GalleryPackage; readonly latest: boolean; readonly published: number }>();
  for (const raw of entries) {
    const pkg = toGalleryPackage(raw);
    if (!pkg) {
      continue;
    }
    const latest = readBoolean(raw, "IsLatestVersion") ?? false;
    const published = pkg.published ? Date.parse(pkg.published) || 0 : 0;
    const key = pkg.name.toLowerCase();
    const existing = byName.get(key);
    if (!existing || (latest && !existing.latest) || (latest === existing.latest && published > existing.published)) {
      byName.set(key, { pkg, latest, published });
    }
  }
  return Array.from(byName.values(), entry => entry.pkg);
}

async function fetchFeed(url: string): Promise<JsonRecord[]> {
  const entries: JsonRecord[] = [];
  let next: string | undefined = url;
  let pages = 0;
  while (next && pages < MAX_FEED_PAGES) {
    const response = await send({
      url: next,
      headers: { Accept: "application/json;odata=verbose" }
    });
    debug(`GET ${next} -> ${response.status}`);
    if (response.status === 404) {
      break;
    }
    if (response.status < 200 || response.status >= 300) {
      throw errorForStatus(next, response.status);
    }
    const page = toFeedPage(response.data);
    entries.push(...page.entries);
    next = page.next;
    pages += 1;
  }
  return entries;
}

/**
 * Latest version of every package listing the author.
 */
export async function findPackagesByAuthor(author: string, baseUrl: string = GALLERY.API_BASE): Promise<GalleryPackage[]> {
  const filter = `IsLatestVersion and Authors eq ${quoteOData(author)}`;
  const entries = await fetchFeed(`${baseUrl}/Packages()?$filter=${encodeURIComponent(filter)}`);
  return latestPerPackage(entries);
}

/**
 * Latest version of one package, or null when the registry does not know it.
 */
export async function findPackage(name: string, baseUrl: string = GALLERY.API_BASE): Promise<GalleryPackage | null> {
  const entries = await fetchFeed(`${baseUrl}/FindPackagesById()?id=${encodeURIComponent(quoteOData(name))}`);
  return latestPerPackage(entries)[0] ?? null;
}
