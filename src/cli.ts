import { Command, InvalidArgumentError, Option } from "commander";
import { runCheck } from "./check.js";
import { GALLERY, GITHUB, NET, REPORT, STATE } from "./config.js";
import { describeError } from "./errors.js";
import { GitHubClient, resolveToken } from "./github/client.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { renderConsoleSummary } from "./report/console.js";
import { writeHtmlReport } from "./report/html.js";
import { loadSnapshot, resetSnapshot } from "./state/store.js";
import { OwnerType } from "./types.js";
import { cutoffSchema, sinceHoursSchema } from "./utils/time.js";

export interface CheckCommandOptions {
  readonly owner?: string;
  readonly ownerType: OwnerType;
  readonly token?: string;
  readonly sinceHours: number;
  readonly cutoff?: string;
  readonly sinceLastCheck: boolean;
  readonly includeForks: boolean;
  readonly author?: string;
  readonly package: string[];
  readonly packages: boolean;
  readonly state: string;
  readonly output: "console" | "html";
  readonly reportDir: string;
  readonly concurrency: number;
  readonly dryRun: boolean;
}

function parseSinceHours(value: string): number {
  const parsed = sinceHoursSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues[0]?.message ?? "invalid since-hours");
  }
  return parsed.data;
}

function parseCutoff(value: string): string {
  const parsed = cutoffSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues[0]?.message ?? "invalid cutoff");
  }
  return parsed.data;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function requireOwner(owner: string | undefined): string {
  if (!owner) {
    throw new Error("An owner is required: pass --owner or set GITHUB_OWNER.");
  }
  return owner;
}

/**
 * Check mode entry point: poll, report, then commit the new snapshot.
 */
export async function checkAction(options: CheckCommandOptions): Promise<void> {
  const owner = requireOwner(options.owner);
  const client = new GitHubClient({ token: resolveToken(options.token, GITHUB.TOKEN) });
  const digest = await runCheck(
    {
      owner,
      ownerType: options.ownerType,
      includeForks: options.includeForks,
      sinceHours: options.sinceHours,
      cutoff: options.cutoff,
      sinceLastCheck: options.sinceLastCheck,
      statePath: options.state,
      packages: options.packages ? { author: options.author, names: options.package } : {},
      concurrency: options.concurrency,
      dryRun: options.dryRun
    },
    { client }
  );
  if (options.output === "html") {
    const file = await writeHtmlReport(options.reportDir, digest);
    info(`HTML report written to ${file}.`);
  } else {
    console.log(renderConsoleSummary(digest));
  }
  if (digest.failures.length > 0) {
    info(`${digest.failures.length} repositories could not be checked.`);
  }
}

/**
 * State mode entry point: print snapshot statistics.
 */
export async function stateAction(options: { readonly owner?: string; readonly state: string }): Promise<void> {
  const snapshot = await loadSnapshot(options.state, options.owner ?? "");
  console.log({
    lastCheck: snapshot.lastCheck,
    repositories: Object.keys(snapshot.entities).length,
    packages: Object.keys(snapshot.packages).length
  });
}

/**
 * Reset mode entry point: clear the state file.
 */
export async function resetAction(options: { readonly owner?: string; readonly state: string }): Promise<void> {
  await resetSnapshot(options.state, requireOwner(options.owner));
}

/**
 * Construct commander program with configured commands.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("activity-digest")
    .description("Report repository and package activity since the last check")
    .version("1.0.0")
    .option("--log-level <level>", "debug, info, warn or error")
    .hook("preAction", command => {
      const level = command.opts<{ logLevel?: string }>().logLevel;
      if (level) {
        setLogLevel(level);
      }
    });

  const activity = program.command("activity").description("Activity operations");
  activity
    .command("check")
    .description("Fetch activity, print or write the digest, and save the new snapshot")
    .option("--owner <owner>", "account whose repositories are polled", GITHUB.OWNER || undefined)
    .addOption(new Option("--owner-type <type>", "user or org").choices(["user", "org"]).default(GITHUB.OWNER_TYPE))
    .option("--token <token>", "API token; overrides GITHUB_TOKEN")
    .option("--since-hours <hours>", "look-back window in hours (1-720)", parseSinceHours, REPORT.SINCE_HOURS)
    .option("--cutoff <iso>", "explicit cutoff timestamp", parseCutoff)
    .option("--since-last-check", "use the stored last check time as cutoff", false)
    .option("--include-forks", "include forked repositories", GITHUB.INCLUDE_FORKS)
    .option("--author <author>", "package registry author to track", GALLERY.AUTHOR || undefined)
    .option("--package <name>", "package to track (repeatable)", collect, [...GALLERY.PACKAGES])
    .option("--no-packages", "skip the package registry")
    .addOption(new Option("--output <kind>", "console or html").choices(["console", "html"]).default("console"))
    .option("--report-dir <dir>", "directory for HTML reports", REPORT.OUTPUT_DIR)
    .option("--state <path>", "state file path", STATE.PATH)
    .option("--concurrency <n>", "repositories fetched in parallel", parsePositiveInt, NET.CONCURRENCY)
    .option("--dry-run", "do not save the new snapshot", false)
    .action(async (options: CheckCommandOptions) => checkAction(options));

  activity
    .command("state")
    .description("Display snapshot statistics")
    .option("--owner <owner>", "owner the state belongs to", GITHUB.OWNER || undefined)
    .option("--state <path>", "state file path", STATE.PATH)
    .action(async (options: { owner?: string; state: string }) => stateAction(options));

  activity
    .command("reset")
    .description("Clear the stored snapshot")
    .option("--owner <owner>", "owner the state belongs to", GITHUB.OWNER || undefined)
    .option("--state <path>", "state file path", STATE.PATH)
    .action(async (options: { owner?: string; state: string }) => resetAction(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (cause) {
    logError(`CLI failed: ${describeError(cause)}`);
    process.exitCode = 1;
  }
}
