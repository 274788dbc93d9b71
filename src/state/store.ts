import fs from "fs-extra";
import { z } from "zod";
import { describeError } from "../errors.js";
import { debug, info, warn } from "../logger.js";
import { JsonRecord, JsonValue, Snapshot, StateFile } from "../types.js";
import { isRecord } from "../utils/json.js";
import { cutoffSchema } from "../utils/time.js";

const BOM = "\uFEFF";

const countSchema = z.number().int().nonnegative();

const repoEntrySchema = z.object({ stars: countSchema.optional(), forks: countSchema.optional() }).passthrough();
const packageEntrySchema = z.object({ downloads: countSchema.optional() }).passthrough();

const stateFileSchema = z
  .object({
    owner: z.string().optional(),
    last_check: cutoffSchema.nullable().optional(),
    repos: z.record(repoEntrySchema).optional(),
    psgallery: z.record(packageEntrySchema).optional()
  })
  .passthrough();

export function emptySnapshot(): Snapshot {
  return { lastCheck: null, entities: {}, packages: {} };
}

function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

async function readRaw(path: string): Promise<JsonValue> {
  const text = await fs.readFile(path, "utf8");
  const parsed: JsonValue = JSON.parse(stripBom(text));
  return parsed;
}

function toSnapshot(file: StateFile): Snapshot {
  const entities: Record<string, { stars?: number; forks?: number }> = {};
  for (const [name, entry] of Object.entries(file.repos ?? {})) {
    entities[name] = { stars: entry.stars, forks: entry.forks };
  }
  const packages: Record<string, { downloads?: number }> = {};
  for (const [name, entry] of Object.entries(file.psgallery ?? {})) {
    packages[name] = { downloads: entry.downloads };
  }
  return { lastCheck: file.last_check ?? null, entities, packages };
}

/**
 * Merge a patch into persisted content. Map-valued keys merge entry by entry;
 * other keys are replaced. Keys absent from the patch are untouched.
 */
export function mergeState(existing: JsonRecord, patch: JsonRecord): JsonRecord {
  const merged: { [key: string]: JsonValue } = { ...existing };
  for (const [key, value] of Object.entries(patch)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

function keepValid(section: JsonValue, schema: z.ZodTypeAny, label: string, dropped: string[]): JsonRecord {
  const kept: { [name: string]: JsonValue } = {};
  if (!isRecord(section)) {
    dropped.push(label);
    return kept;
  }
  for (const [name, entry] of Object.entries(section)) {
    if (schema.safeParse(entry).success) {
      kept[name] = entry;
    } else {
      dropped.push(`${label}.${name}`);
    }
  }
  return kept;
}

/**
 * Drop whatever does not fit the state layout, entry by entry, so one bad
 * entry never costs the others. Returns the kept content and the dropped paths.
 */
export function cleanState(raw: JsonRecord): { readonly state: JsonRecord; readonly dropped: string[] } {
  const dropped: string[] = [];
  const state: { [key: string]: JsonValue } = { ...raw };
  if (raw.owner !== undefined && typeof raw.owner !== "string") {
    delete state.owner;
    dropped.push("owner");
  }
  if (raw.last_check !== undefined && !cutoffSchema.nullable().safeParse(raw.last_check).success) {
    state.last_check = null;
    dropped.push("last_check");
  }
  if (raw.repos !== undefined) {
    state.repos = keepValid(raw.repos, repoEntrySchema, "repos", dropped);
  }
  if (raw.psgallery !== undefined) {
    state.psgallery = keepValid(raw.psgallery, packageEntrySchema, "psgallery", dropped);
  }
  return { state, dropped };
}

function sameOwner(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}

/**
 * Load the last known values for an owner.
 *
 * Never throws: a missing, unreadable, malformed or foreign-owner file yields
 * an empty snapshot (with a warning for everything but a missing file).
 */
export async function loadSnapshot(path: string, owner: string): Promise<Snapshot> {
  if (!(await fs.pathExists(path))) {
    debug(`State file ${path} absent, starting with empty state.`);
    return emptySnapshot();
  }
  let raw: JsonValue;
  try {
    raw = await readRaw(path);
  } catch (cause) {
    warn(`State file ${path} unreadable (${describeError(cause)}), starting with empty state.`);
    return emptySnapshot();
  }
  if (!isRecord(raw)) {
    warn(`State file ${path} malformed (not an object), starting with empty state.`);
    return emptySnapshot();
  }
  const { state, dropped } = cleanState(raw);
  if (dropped.length > 0) {
    warn(`State file ${path} has malformed entries (${dropped.join(", ")}); they are ignored.`);
  }
  const parsed = stateFileSchema.safeParse(state);
  if (!parsed.success) {
    warn(`State file ${path} malformed (${parsed.error.issues[0]?.message ?? "invalid shape"}), starting with empty state.`);
    return emptySnapshot();
  }
  if (parsed.data.owner && owner && !sameOwner(parsed.data.owner, owner)) {
    warn(`State file ${path} belongs to ${parsed.data.owner}, not ${owner}; starting with empty state.`);
    return emptySnapshot();
  }
  const snapshot = toSnapshot(parsed.data);
  debug(
    `Loaded state for ${owner}: ${Object.keys(snapshot.entities).length} repositories, ${Object.keys(snapshot.packages).length} packages.`
  );
  return snapshot;
}

/**
 * Merge `patch` into the persisted file and write it back via a temporary file
 * and rename. Parent directories are created as needed.
 *
 * Malformed entries of the persisted file are not carried over, and a file
 * stamped with another owner is replaced rather than merged.
 */
export async function saveSnapshot(path: string, patch: JsonRecord): Promise<void> {
  let existing: JsonRecord = {};
  if (await fs.pathExists(path)) {
    try {
      const raw = await readRaw(path);
      if (isRecord(raw)) {
        existing = cleanState(raw).state;
      } else {
        warn(`Existing state ${path} is not an object; it will be replaced.`);
      }
    } catch (cause) {
      warn(`Existing state ${path} unreadable (${describeError(cause)}); it will be replaced.`);
    }
  }
  const previousOwner = existing.owner;
  const nextOwner = patch.owner;
  if (typeof previousOwner === "string" && typeof nextOwner === "string" && !sameOwner(previousOwner, nextOwner)) {
    warn(`Existing state ${path} belongs to ${previousOwner}; it will be replaced for ${nextOwner}.`);
    existing = {};
  }
  const merged = mergeState(existing, patch);
  const tempPath = `${path}.tmp`;
  await fs.outputFile(tempPath, `${BOM}${JSON.stringify(merged, null, 2)}\n`, "utf8");
  await fs.move(tempPath, path, { overwrite: true });
  debug(`State saved to ${path} (${Object.keys(patch).join(", ")}).`);
}

/**
 * Replace the state file with an empty snapshot for the owner.
 */
export async function resetSnapshot(path: string, owner: string): Promise<void> {
  if (await fs.pathExists(path)) {
    await fs.remove(path);
  }
  await saveSnapshot(path, { owner, last_check: null, repos: {}, psgallery: {} });
  info(`State for ${owner} cleared at ${path}.`);
}
