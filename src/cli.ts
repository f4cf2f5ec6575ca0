// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Option handling and report formatting are verified without process-wide side effects.

import { Command } from "commander";
import * as readline from "readline/promises";
import { CatalogClient } from "./catalog.js";
import { CATALOG, DEFAULT_CONFIG_PATH, DOWNLOAD, loadConfig, NET, SESSION } from "./config.js";
import { DownloadManager } from "./downloader.js";
import { ConfigError, describeError, PatchDownloaderError } from "./errors.js";
import { LayoutWriter } from "./layout.js";
import { debug, error as logError, info, setLogLevel } from "./logger.js";
import { readPatchList } from "./patch-list.js";
import { runPipeline } from "./pipeline.js";
import { RunSummary, StopSignal } from "./scheduler.js";
import { SessionProvider } from "./session.js";
import { AppConfig, Platform, ProgressFunction } from "./types.js";
import { formatMegabytes } from "./utils/disk.js";

export interface CliOptions {
  readonly config: string;
  readonly dryRun?: boolean;
  readonly debug?: boolean;
  readonly file?: string;
  readonly user?: string;
  readonly password?: string | boolean;
  readonly listPlatforms?: boolean;
}

/**
 * Platform table sorted by name, as printed by `--list-platforms`.
 */
export function formatPlatformTable(platforms: readonly Platform[]): string[] {
  if (platforms.length === 0) {
    return [];
  }
  const sorted = [...platforms].sort((left, right) => left.name.localeCompare(right.name));
  return [
    "CODE   - NAME",
    "==========================================================",
    ...sorted.map(platform => `${platform.code.padEnd(6)} - ${platform.name}`)
  ];
}

/**
 * Final report lines for a download run.
 */
export function formatSummary(summary: RunSummary, totalBytes: number): string[] {
  const lines = [
    `Files: ${summary.total}, downloaded: ${summary.downloaded}, already present: ${summary.skipped}, failed: ${summary.failed}, not started: ${summary.notStarted}`,
    `Total size ~ ${formatMegabytes(totalBytes)}`
  ];
  if (summary.stopReason) {
    lines.push(`Stopped early: ${summary.stopReason}`);
  }
  for (const failure of summary.failures) {
    lines.push(`FAILED ${failure.fileName}: ${failure.message}`);
  }
  return lines;
}

/**
 * Exit status of a run: non-zero when anything failed or never started.
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.failed > 0 || summary.notStarted > 0 ? 1 : 0;
}

/**
 * Logs progress at every tenth of each file.
 */
export function createProgressReporter(): ProgressFunction {
  const lastDecile = new Map<string, number>();
  return (fileName, totalBytes, receivedBytes) => {
    const decile = totalBytes > 0 ? Math.min(10, Math.floor((receivedBytes * 10) / totalBytes)) : 10;
    if (decile !== lastDecile.get(fileName)) {
      lastDecile.set(fileName, decile);
      debug(`${fileName}: ${decile * 10}% of ${formatMegabytes(totalBytes)}`);
    }
  };
}

async function promptPassword(username: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(`Catalog password for ${username}: `);
  } finally {
    rl.close();
  }
}

/**
 * Password precedence: `-p value`, then a prompt for bare `-p`, then the config file, then CATALOG_PASSWORD.
 */
export async function resolvePassword(
  option: string | boolean | undefined,
  config: AppConfig,
  username: string,
  prompt: (username: string) => Promise<string> = promptPassword
): Promise<string> {
  if (typeof option === "string" && option !== "") {
    return option;
  }
  if (option === true) {
    return prompt(username);
  }
  const password = config.credentials.password ?? CATALOG.PASSWORD;
  if (!password) {
    throw new ConfigError("No catalog password: pass -p, set credentials.password, or set CATALOG_PASSWORD.");
  }
  return password;
}

/**
 * Main action: list platforms, or resolve and download.
 *
 * @returns Process exit code.
 */
export async function downloadAction(options: CliOptions): Promise<number> {
  if (options.debug) {
    setLogLevel("debug");
  }
  if (!CATALOG.BASE_URL) {
    throw new ConfigError("CATALOG_BASE_URL must be configured.");
  }
  const config = await loadConfig(options.config);
  const username = options.user ?? config.credentials.username;
  const password = await resolvePassword(options.password, config, username);
  const retry = { attempts: CATALOG.RETRY_ATTEMPTS, baseDelayMs: NET.RETRY_BASE_DELAY_MS };

  const session = new SessionProvider({
    loginUrl: CATALOG.LOGIN_URL || `${CATALOG.BASE_URL}/login`,
    username,
    password,
    ttlMs: SESSION.TTL_MS,
    maxRedirects: SESSION.MAX_REDIRECTS,
    retry
  });
  const catalog = new CatalogClient(session, { baseUrl: CATALOG.BASE_URL, retry });

  info("Initializing downloader.");
  await session.current();

  if (options.listPlatforms) {
    formatPlatformTable(await catalog.listPlatforms()).forEach(line => console.log(line));
    return 0;
  }

  const patchList = options.file ? await readPatchList(options.file) : undefined;
  const signal = new StopSignal();
  const onInterrupt = (): void => signal.stop("interrupted");
  process.once("SIGINT", onInterrupt);

  try {
    const result = await runPipeline(
      {
        catalog,
        manager: new DownloadManager({
          session,
          retry: { attempts: DOWNLOAD.RETRY_ATTEMPTS, baseDelayMs: NET.RETRY_BASE_DELAY_MS },
          onProgress: createProgressReporter()
        }),
        layout: new LayoutWriter()
      },
      { config, patchList, dryRun: options.dryRun ?? false, signal }
    );

    if (result.kind === "dry-run") {
      console.log(`Total download size ~ ${formatMegabytes(result.plan.totalBytes)} (${result.plan.tasks.length} files)`);
      return 0;
    }
    formatSummary(result.summary, result.plan.totalBytes).forEach(line => console.log(line));
    return exitCodeFor(result.summary);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

/**
 * Construct commander program with configured options.
 */
export function buildProgram(action: (options: CliOptions) => Promise<number> = downloadAction): Command {
  const program = new Command();
  program
    .name("quarterly-patches")
    .description(
      "Downloads recommended patches for the current quarter. Alternatively downloads the patches listed in a CSV file."
    )
    .version("1.0.0")
    .option("-c, --config <path>", "JSON configuration file", DEFAULT_CONFIG_PATH)
    .option("--dry-run", "report the size that would be downloaded without downloading")
    .option("--debug", "increase the level of information during the execution")
    .option("-f, --file <path>", "download the patches listed in this CSV file instead of the recommendations")
    .option("-u, --user <username>", "catalog username (defaults to the configuration file)")
    .option("-p, --password [password]", "catalog password; prompted when given without a value")
    .option("-l, --list-platforms", "only print the platform codes and names")
    .action(async (options: CliOptions) => {
      process.exitCode = await action(options);
    });
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
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (error) {
    if (error instanceof PatchDownloaderError) {
      logError(`${error.name}: ${error.message}`);
    } else {
      logError(`CLI failed: ${describeError(error)}`);
    }
    process.exitCode = 1;
  }
}
