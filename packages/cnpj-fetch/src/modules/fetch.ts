import { Command } from "commander";
import chalk from "chalk";
import {
  LIMITS,
  loadConfig,
  parseFolderOption,
  parseIntegerOption,
  parseUrlOption,
  type ResolvedConfig,
} from "../lib/config.js";
import { getContext } from "../lib/cli-context.js";
import { createProcessSignalHandler } from "../lib/adapters/index.js";
import { createPipeline, type PipelineReport } from "../lib/pipeline.js";
import { createReporter, type ReporterMode } from "../lib/reporter.js";
import { outputSuccess, type DryRunResultJson } from "../lib/json-output.js";
import { renderManifest, renderPlan } from "../lib/summary.js";
import { renderError, renderUnknownError } from "../lib/errors/renderer.js";
import { createRuntime, type CommandDeps } from "./runtime.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchOptions {
  baseUrl?: string;
  downloadDir?: string;
  timeout?: string;
  retries?: string;
  backoff?: string;
  folder?: string;
  strictSize?: boolean;
  verifyExisting?: boolean;
  dryRun?: boolean;
  config?: string;
}

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CANCELLED = 130;

// ---------------------------------------------------------------------------
// Option Handling (Pure Functions)
// ---------------------------------------------------------------------------

/**
 * Validate command-line flags into config overrides.
 * Throws VALIDATION_INVALID_OPTION on the first bad value.
 */
export function overridesFromFlags(options: FetchOptions): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {};

  if (options.baseUrl !== undefined) {
    overrides.baseUrl = parseUrlOption(options.baseUrl, "--base-url");
  }
  if (options.downloadDir !== undefined) {
    overrides.downloadDir = options.downloadDir;
  }
  if (options.timeout !== undefined) {
    overrides.timeoutSeconds = parseIntegerOption(options.timeout, "--timeout", LIMITS.timeoutSeconds);
  }
  if (options.retries !== undefined) {
    overrides.maxRetries = parseIntegerOption(options.retries, "--retries", LIMITS.maxRetries);
  }
  if (options.backoff !== undefined) {
    overrides.backoffSeconds = parseIntegerOption(options.backoff, "--backoff", LIMITS.backoffSeconds);
  }
  if (options.folder !== undefined) {
    overrides.folder = parseFolderOption(options.folder);
  }
  if (options.strictSize) {
    overrides.strictSize = true;
  }
  if (options.verifyExisting) {
    overrides.verifyExisting = true;
  }

  return overrides;
}

export function exitCodeFor(report: PipelineReport): number {
  if (report.status === "aborted" && report.error.code === "CANCELLED") {
    return EXIT_CANCELLED;
  }
  return report.ok ? EXIT_OK : EXIT_FAILED;
}

function reporterMode(): ReporterMode {
  const ctx = getContext();
  if (ctx.json) return "json";
  return ctx.quiet ? "quiet" : "human";
}

function printReport(report: PipelineReport, json: boolean): void {
  switch (report.status) {
    case "aborted":
      renderError(report.error);
      return;
    case "planned":
      if (json) {
        const data: DryRunResultJson = {
          folder: report.folder.name,
          folderUrl: report.folder.url,
          files: report.plan,
        };
        outputSuccess(data);
      } else {
        console.log(renderPlan(report.plan));
      }
      return;
    case "completed":
      // JSON mode already streamed a RunSummary line
      if (!json) console.log(renderManifest(report.summary));
      return;
  }
}

// ---------------------------------------------------------------------------
// Core Fetch Logic
// ---------------------------------------------------------------------------

/**
 * Run one fetch from flags to exit code.
 * SIGINT/SIGTERM abort the run; the in-flight partial file is removed.
 */
export async function runFetch(options: FetchOptions, deps: CommandDeps = {}): Promise<number> {
  const ctx = getContext();

  let config: ResolvedConfig;
  let sources: string[];
  try {
    ({ config, sources } = loadConfig(options.config, overridesFromFlags(options), deps.env));
  } catch (error) {
    renderUnknownError(error);
    return EXIT_FAILED;
  }

  const { logger, downloader, listing } = createRuntime(config, deps);
  if (sources.length > 0) {
    logger.debug("Loaded configuration", { sources });
  }

  const controller = new AbortController();
  const signalHandler = deps.signalHandler ?? createProcessSignalHandler();
  signalHandler.onShutdown((signal) => {
    logger.warn("Received signal, cancelling run", { signal });
    controller.abort();
  });

  const reporter = createReporter({ mode: reporterMode() });

  let report: PipelineReport;
  try {
    report = await createPipeline(
      { ...config, dryRun: options.dryRun ?? false },
      {
        downloader,
        listing,
        logger,
        delay: deps.delay,
        onEvent: reporter.onEvent,
        onProgress: reporter.onProgress,
        signal: controller.signal,
      }
    ).run();
  } finally {
    reporter.close();
    signalHandler.removeAll();
  }

  printReport(report, ctx.json);
  return exitCodeFor(report);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerFetchCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command("fetch", { isDefault: true })
    .description("Download every archive of the latest CNPJ release")
    .option("--base-url <url>", "Portal root listing the yyyy-mm release folders")
    .option("-d, --download-dir <dir>", "Destination directory (default: ./Downloads_CNPJ)")
    .option("--timeout <seconds>", "Connect and idle timeout per request (default: 300)")
    .option("--retries <n>", "Attempts per file (default: 3)")
    .option("--backoff <seconds>", "Backoff unit; attempt n waits n times this (default: 10)")
    .option("--folder <yyyy-mm>", "Download this release instead of the latest")
    .option("--strict-size", "Retry files whose size differs from Content-Length")
    .option("--verify-existing", "Re-download existing files whose remote size differs")
    .option("-n, --dry-run", "Resolve and list files without downloading")
    .option("-c, --config <path>", "Path to configuration file")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("How It Works:")}
  1. Reads the portal root and picks the newest yyyy-mm folder
  2. Lists the .zip and .txt files in that folder
  3. Downloads them one at a time, skipping files already on disk
  4. Failed attempts are retried after 20s, 30s, ... and partial files removed

${chalk.bold.cyan("Examples:")}
  cnpj-fetch
      ${chalk.gray("Download the latest release into ./Downloads_CNPJ")}

  cnpj-fetch -d /data/cnpj --retries 5
      ${chalk.gray("Custom destination and retry budget")}

  cnpj-fetch --folder 2024-07 --dry-run
      ${chalk.gray("Show what a given release would download")}

  cnpj-fetch --json > run.ndjson
      ${chalk.gray("Stream NDJSON events for scripting")}

${chalk.bold.cyan("Exit Codes:")}
  0  every file downloaded or already present
  1  a file failed, or the release could not be resolved
  130  interrupted
`
    )
    .action(async (options: FetchOptions) => {
      process.exitCode = await runFetch(options, deps);
    });
}
