import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildProgram, resetAction, stateAction } from "../src/cli.js";

describe("CLI program", () => {
  it("registers the activity subcommands", () => {
    const program = buildProgram();
    const activity = program.commands.find(command => command.name() === "activity");
    expect(activity).toBeDefined();
    expect(activity?.commands.map(command => command.name())).toEqual(["check", "state", "reset"]);
  });

  it("exposes the check options", () => {
    const check = buildProgram()
      .commands.find(command => command.name() === "activity")
      ?.commands.find(command => command.name() === "check");
    const flags = check?.options.map(option => option.long) ?? [];
    expect(flags).toEqual(
      expect.arrayContaining(["--owner", "--since-hours", "--since-last-check", "--package", "--output", "--dry-run"])
    );
  });
});

describe("state commands", () => {
  let dir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "activity-cli-"));
    statePath = path.join(dir, "state.json");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("prints snapshot statistics", async () => {
    await fs.writeJson(statePath, {
      owner: "octo",
      last_check: "2024-05-01T00:00:00Z",
      repos: { one: { stars: 1, forks: 0 }, two: { stars: 2, forks: 0 } },
      psgallery: { TestModule: { downloads: 100 } }
    });

    await buildProgram().parseAsync(["activity", "state", "--owner", "octo", "--state", statePath], { from: "user" });

    expect(console.log).toHaveBeenCalledWith({ lastCheck: "2024-05-01T00:00:00Z", repositories: 2, packages: 1 });
  });

  it("resets the state for an owner", async () => {
    await fs.writeJson(statePath, { owner: "octo", last_check: "2024-05-01T00:00:00Z", repos: { one: { stars: 1 } } });

    await resetAction({ owner: "octo", state: statePath });
    await stateAction({ owner: "octo", state: statePath });

    expect(console.log).toHaveBeenCalledWith({ lastCheck: null, repositories: 0, packages: 0 });
  });

  it("refuses to reset without an owner", async () => {
    await expect(resetAction({ state: statePath })).rejects.toThrow("An owner is required");
  });
});
