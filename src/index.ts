#!/usr/bin/env node
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { runCheck } from "./check.js";
export { GitHubClient } from "./github/client.js";
export { loadSnapshot, saveSnapshot } from "./state/store.js";
export { summarize } from "./digest/aggregate.js";
export * from "./errors.js";
export type * from "./types.js";
