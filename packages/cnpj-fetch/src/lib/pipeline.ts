import { join, resolve } from "path";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import type { FileDownloader } from "./ports/download.js";
import type { ListingFetcher } from "./ports/listing.js";
import type { ListingParser } from "./listing-parser.js";
import type { ResolvedConfig } from "./config.js";
import type { FetchEventListener, ProgressListener } from "./events.js";
import { createFolderResolver, type ResolvedFolder } from "./folder-resolver.js";
import {
  createFetchOrchestrator,
  linearBackoff,
  type FetchSummary,
  type RemoteFile,
} from "./fetch-orchestrator.js";
import { ensureDirectory, localFileSize } from "./local-files.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { unknownError } from "./errors/catalog.js";
import type { FetchError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PipelineConfig = Pick<
  ResolvedConfig,
  | "baseUrl"
  | "folder"
  | "downloadDir"
  | "timeoutSeconds"
  | "maxRetries"
  | "backoffSeconds"
  | "strictSize"
  | "verifyExisting"
> & {
  /** Resolve and list only; nothing is written */
  dryRun?: boolean;
};

export interface PipelineDeps {
  downloader: FileDownloader;
  listing: ListingFetcher;
  parser?: ListingParser;
  logger?: Logger;
  delay?: DelayFn;
  clock?: Clock;
  onEvent?: FetchEventListener;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

export interface PlannedFile extends RemoteFile {
  path: string;
  localBytes: number | null;
  action: "download" | "skip";
}

export type PipelineReport =
  | { status: "completed"; ok: boolean; folder: ResolvedFolder; summary: FetchSummary }
  | { status: "planned"; ok: true; folder: ResolvedFolder; plan: PlannedFile[] }
  | { status: "aborted"; ok: false; folder?: ResolvedFolder; error: FetchError };

export interface Pipeline {
  run(): Promise<PipelineReport>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

async function planFiles(files: RemoteFile[], downloadDir: string): Promise<PlannedFile[]> {
  const plan: PlannedFile[] = [];
  for (const file of files) {
    const path = join(downloadDir, file.name);
    const localBytes = await localFileSize(path);
    plan.push({
      ...file,
      path,
      localBytes,
      action: localBytes !== null && localBytes > 0 ? "skip" : "download",
    });
  }
  return plan;
}

/**
 * Compose folder resolution, file listing and the download loop into one run.
 *
 * Resolution and listing failures end the run with status "aborted";
 * per-file failures are contained in the summary and only flip `ok`.
 */
export function createPipeline(config: PipelineConfig, deps: PipelineDeps): Pipeline {
  const { downloader, listing, parser, delay, clock, onEvent, onProgress, signal } = deps;
  const logger = deps.logger ?? createNoopLogger();
  const timeoutMs = config.timeoutSeconds * 1000;

  async function run(): Promise<PipelineReport> {
    let folder: ResolvedFolder | undefined;

    try {
      const downloadDir = config.dryRun
        ? resolve(config.downloadDir)
        : await ensureDirectory(config.downloadDir);

      const resolver = createFolderResolver({ listing, parser, timeoutMs, logger, signal });
      folder = await resolver.resolve(config.baseUrl, config.folder);
      onEvent?.({ type: "FolderResolved", folder: folder.name, url: folder.url });
      logger.info("Using release folder", { folder: folder.name, url: folder.url });

      const orchestrator = createFetchOrchestrator({
        downloader,
        listing,
        parser,
        timeoutMs,
        maxRetries: config.maxRetries,
        backoff: linearBackoff(config.backoffSeconds),
        strictSize: config.strictSize,
        verifyExisting: config.verifyExisting,
        logger,
        delay,
        clock,
        onEvent,
        onProgress,
        signal,
      });

      if (config.dryRun) {
        const files = await orchestrator.listFiles(folder.url);
        return { status: "planned", ok: true, folder, plan: await planFiles(files, downloadDir) };
      }

      const summary = await orchestrator.fetchAll(folder.url, downloadDir);
      onEvent?.({
        type: "RunSummary",
        totalBytes: summary.totalBytes,
        downloadedBytes: summary.downloadedBytes,
        counts: summary.counts,
        durationMs: summary.durationMs,
      });
      logger.info("Run finished", { ...summary.counts, totalBytes: summary.totalBytes });

      return { status: "completed", ok: summary.counts.failed === 0, folder, summary };
    } catch (error) {
      const failure = unknownError(error);
      logger.error("Run aborted", {
        code: failure.code,
        error: failure.message,
        folder: folder?.name,
      });
      return { status: "aborted", ok: false, folder, error: failure };
    }
  }

  return { run };
}
