import type { FileDownloader } from "../lib/ports/download.js";
import type { ListingFetcher } from "../lib/ports/listing.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import type { DelayFn } from "../lib/ports/timer.js";
import { createHttpDownloader, createHttpListingFetcher } from "../lib/adapters/index.js";
import { getContext } from "../lib/cli-context.js";
import type { ResolvedConfig } from "../lib/config.js";
import { createLogger, stderrSink, type LogSink, type Logger } from "../lib/logger.js";

/**
 * Dependencies for the commands.
 * All have defaults for production use; tests swap in fakes.
 */
export interface CommandDeps {
  downloader?: FileDownloader;
  listing?: ListingFetcher;
  signalHandler?: SignalHandler;
  delay?: DelayFn;
  env?: NodeJS.ProcessEnv;
  logSink?: LogSink;
}

export interface CommandRuntime {
  logger: Logger;
  downloader: FileDownloader;
  listing: ListingFetcher;
}

/**
 * Logger and HTTP adapters for one command invocation.
 * Logs go to stderr; `--verbose` forces debug level.
 */
export function createRuntime(config: ResolvedConfig, deps: CommandDeps = {}): CommandRuntime {
  const ctx = getContext();
  const logger = createLogger({
    level: ctx.verbose ? "debug" : config.logLevel,
    json: config.logJson || ctx.json,
    sink: deps.logSink ?? stderrSink,
  });

  return {
    logger,
    downloader: deps.downloader ?? createHttpDownloader({ logger }),
    listing: deps.listing ?? createHttpListingFetcher(),
  };
}
