import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { emptySnapshot, loadSnapshot, mergeState, resetSnapshot, saveSnapshot } from "../src/state/store.js";

describe("state store", () => {
  let dir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "activity-state-"));
    statePath = path.join(dir, "nested", "state.json");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("starts empty when the file is missing", async () => {
    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual(emptySnapshot());
  });

  it("recovers from unparseable content with a warning", async () => {
    await fs.outputFile(statePath, "{ not json", "utf8");

    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual(emptySnapshot());
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("unreadable"));
  });

  it("recovers from a wrongly shaped file with a warning", async () => {
    await fs.outputFile(statePath, JSON.stringify({ repos: "everything" }), "utf8");

    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual(emptySnapshot());
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("malformed"));
  });

  it("fills in missing top-level keys", async () => {
    await fs.outputFile(statePath, "{}", "utf8");
    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual({ lastCheck: null, entities: {}, packages: {} });
  });

  it("keeps partial legacy entries without inventing values", async () => {
    await fs.outputFile(statePath, JSON.stringify({ repos: { legacy: { stars: 4 } }, psgallery: { Tool: {} } }), "utf8");

    const snapshot = await loadSnapshot(statePath, "octo");

    expect(snapshot.entities.legacy?.stars).toBe(4);
    expect(snapshot.entities.legacy?.forks).toBeUndefined();
    expect(snapshot.packages.Tool?.downloads).toBeUndefined();
  });

  it("merges saves with existing content, patched values winning", async () => {
    await saveSnapshot(statePath, {
      last_check: "2024-05-01T00:00:00Z",
      repos: { alpha: { stars: 1, forks: 1 }, beta: { stars: 2, forks: 2 } },
      psgallery: { Tool: { downloads: 10 } }
    });
    await saveSnapshot(statePath, {
      last_check: "2024-05-02T00:00:00Z",
      repos: { beta: { stars: 3, forks: 2 }, gamma: { stars: 0, forks: 0 } }
    });

    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual({
      lastCheck: "2024-05-02T00:00:00Z",
      entities: {
        alpha: { stars: 1, forks: 1 },
        beta: { stars: 3, forks: 2 },
        gamma: { stars: 0, forks: 0 }
      },
      packages: { Tool: { downloads: 10 } }
    });
  });

  it("writes UTF-8 with a byte-order mark and leaves no temp file", async () => {
    await saveSnapshot(statePath, { last_check: null });

    const text = await fs.readFile(statePath, "utf8");
    expect(text.charCodeAt(0)).toBe(0xfeff);
    expect(JSON.parse(text.slice(1))).toEqual({ last_check: null });
    expect(await fs.pathExists(`${statePath}.tmp`)).toBe(false);
  });

  it("ignores state recorded for another owner", async () => {
    await saveSnapshot(statePath, { owner: "someone-else", repos: { alpha: { stars: 1, forks: 1 } } });

    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual(emptySnapshot());
    await expect(loadSnapshot(statePath, "Someone-Else")).resolves.toMatchObject({ entities: { alpha: { stars: 1 } } });
  });

  it("replaces a corrupt file on save", async () => {
    await fs.outputFile(statePath, "garbage", "utf8");

    await saveSnapshot(statePath, { repos: { alpha: { stars: 5, forks: 0 } } });

    await expect(loadSnapshot(statePath, "octo")).resolves.toMatchObject({ entities: { alpha: { stars: 5, forks: 0 } } });
  });

  it("drops a malformed entry and keeps the rest", async () => {
    await fs.outputFile(
      statePath,
      JSON.stringify({ repos: { ghost: { stars: -1 }, active: { stars: 10, forks: 1 } }, psgallery: { Tool: { downloads: "many" } } }),
      "utf8"
    );

    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual({
      lastCheck: null,
      entities: { active: { stars: 10, forks: 1 } },
      packages: {}
    });
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("(repos.ghost, psgallery.Tool)"));
  });

  it("does not write a malformed entry back on save", async () => {
    await fs.outputFile(statePath, JSON.stringify({ repos: { ghost: { stars: -1 }, active: { stars: 10, forks: 1 } } }), "utf8");

    await saveSnapshot(statePath, { repos: { active: { stars: 12, forks: 1 } } });

    const text = await fs.readFile(statePath, "utf8");
    expect(JSON.parse(text.slice(1))).toEqual({ repos: { active: { stars: 12, forks: 1 } } });
    await expect(loadSnapshot(statePath, "octo")).resolves.toMatchObject({ entities: { active: { stars: 12, forks: 1 } } });
  });

  it("replaces rather than merges state saved for another owner", async () => {
    await saveSnapshot(statePath, { owner: "alice", repos: { bar: { stars: 100, forks: 0 } } });

    await saveSnapshot(statePath, { owner: "bob", repos: { foo: { stars: 1, forks: 0 } } });

    await expect(loadSnapshot(statePath, "bob")).resolves.toEqual({
      lastCheck: null,
      entities: { foo: { stars: 1, forks: 0 } },
      packages: {}
    });
  });

  it("keeps merging when the owner differs only in case", async () => {
    await saveSnapshot(statePath, { owner: "Octo", repos: { bar: { stars: 2, forks: 0 } } });

    await saveSnapshot(statePath, { owner: "octo", repos: { foo: { stars: 1, forks: 0 } } });

    await expect(loadSnapshot(statePath, "octo")).resolves.toMatchObject({
      entities: { bar: { stars: 2, forks: 0 }, foo: { stars: 1, forks: 0 } }
    });
  });

  it("discards a last check that is not a date", async () => {
    await fs.outputFile(
      statePath,
      JSON.stringify({ last_check: "yesterday-ish", repos: { active: { stars: 3, forks: 0 } } }),
      "utf8"
    );

    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual({
      lastCheck: null,
      entities: { active: { stars: 3, forks: 0 } },
      packages: {}
    });
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("(last_check)"));
  });

  it("resets to an empty snapshot for the owner", async () => {
    await saveSnapshot(statePath, { owner: "octo", last_check: "2024-05-01T00:00:00Z", repos: { alpha: { stars: 1 } } });

    await resetSnapshot(statePath, "octo");

    await expect(loadSnapshot(statePath, "octo")).resolves.toEqual(emptySnapshot());
  });
});

describe("mergeState", () => {
  it("merges maps entry by entry and replaces scalars", () => {
    expect(
      mergeState({ owner: "octo", repos: { a: { stars: 1 } }, extra: 1 }, { repos: { b: { stars: 2 } }, owner: "octo" })
    ).toEqual({ owner: "octo", repos: { a: { stars: 1 }, b: { stars: 2 } }, extra: 1 });
  });
});
