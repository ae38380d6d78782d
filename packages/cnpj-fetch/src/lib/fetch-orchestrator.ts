import { join, posix } from "path";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import type { DownloadResult, FileDownloader } from "./ports/download.js";
import type { ListingFetcher } from "./ports/listing.js";
import { realDelay } from "./adapters/real-timers.js";
import { systemClock } from "./adapters/system-clock.js";
import { regexListingParser, type ListingParser } from "./listing-parser.js";
import { localFileSize, removeFile } from "./local-files.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { FetchEventListener, ProgressListener, RunCounts } from "./events.js";
import {
  cancelled,
  errorMessage,
  fileCheckFailed,
  isRetryable,
  noFilesFound,
  sizeMismatch,
  unknownError,
} from "./errors/catalog.js";
import { hasCode, type ErrorCode, type FetchError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RemoteFile {
  /** Local file name */
  name: string;
  /** Absolute download URL */
  url: string;
}

export type FileStatus = "skipped" | "succeeded" | "failed";

export interface FetchEntry {
  name: string;
  url: string;
  path: string;
  status: FileStatus;
  /** On-disk size for skipped and succeeded files, 0 for failed ones */
  bytes: number;
  /** Attempts made; 0 for skipped files */
  attempts: number;
  expectedBytes?: number | null;
  verified?: boolean | "unknown";
  code?: ErrorCode;
  error?: string;
}

export interface FetchSummary {
  folderUrl: string;
  destinationDir: string;
  entries: FetchEntry[];
  counts: RunCounts;
  /** Bytes on disk for succeeded and skipped files */
  totalBytes: number;
  /** Bytes transferred in this run */
  downloadedBytes: number;
  durationMs: number;
}

/**
 * Lifecycle of one file's download.
 */
export type TaskState =
  | { kind: "pending" }
  | { kind: "attempting"; attempt: number }
  | { kind: "succeeded"; attempts: number; result: DownloadResult }
  | { kind: "failed"; attempts: number; error: FetchError };

type ActiveState = Extract<TaskState, { kind: "pending" | "attempting" }>;
type SettledState = Extract<TaskState, { kind: "succeeded" | "failed" }>;

/** Milliseconds to wait before the given attempt number (2, 3, ...) */
export type BackoffFn = (attempt: number) => number;

export interface OrchestratorOptions {
  downloader: FileDownloader;
  listing: ListingFetcher;
  /** Per-request timeout */
  timeoutMs: number;
  /** Total attempts per file */
  maxRetries: number;
  backoff?: BackoffFn;
  parser?: ListingParser;
  /** Count a Content-Length mismatch as a failed attempt */
  strictSize?: boolean;
  /** Check the remote size of files already on disk */
  verifyExisting?: boolean;
  logger?: Logger;
  delay?: DelayFn;
  clock?: Clock;
  onEvent?: FetchEventListener;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

export interface FetchOrchestrator {
  /** Files linked from a folder listing, deduplicated */
  listFiles(folderUrl: string): Promise<RemoteFile[]>;
  /** Download the given files one after another */
  fetchFiles(files: RemoteFile[], destinationDir: string, folderUrl?: string): Promise<FetchSummary>;
  /** listFiles + fetchFiles */
  fetchAll(folderUrl: string, destinationDir: string): Promise<FetchSummary>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_BACKOFF_SECONDS = 10;

/**
 * Delay before attempt n is `seconds * n`: 20s before attempt 2, 30s before 3.
 */
export function linearBackoff(seconds: number = DEFAULT_BACKOFF_SECONDS): BackoffFn {
  return (attempt) => seconds * attempt * 1000;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export type HrefResolution =
  | { ok: true; file: RemoteFile }
  | { ok: false; reason: string };

const UNSAFE_NAME = /[\/\\\0]/;

/**
 * Turn a listing href into a download URL and local file name.
 * The URL must stay on the folder's origin and the decoded name must be a
 * single path segment.
 */
export function resolveHref(href: string, folderUrl: string): HrefResolution {
  let url: URL;
  try {
    url = new URL(href, folderUrl);
  } catch {
    return { ok: false, reason: "not a valid URL" };
  }

  if (url.origin !== new URL(folderUrl).origin) {
    return { ok: false, reason: `points to another host (${url.origin})` };
  }

  const name = safeDecodeURIComponent(posix.basename(url.pathname));
  if (name === "" || name === "." || name === ".." || UNSAFE_NAME.test(name)) {
    return { ok: false, reason: `unsafe file name "${name}"` };
  }

  return { ok: true, file: { name, url: url.toString() } };
}

export interface ListFilesOptions {
  listing: ListingFetcher;
  timeoutMs: number;
  parser?: ListingParser;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Files linked from a folder listing, deduplicated by local name in
 * first-seen order. Hrefs that do not resolve to a safe file on the same
 * host are skipped with a warning. Throws NO_FILES_FOUND when none remain.
 */
export async function listFolderFiles(
  folderUrl: string,
  { listing, timeoutMs, parser = regexListingParser, logger = createNoopLogger(), signal }: ListFilesOptions
): Promise<RemoteFile[]> {
  const html = await listing.fetchText(folderUrl, { timeoutMs, signal });

  const byName = new Map<string, RemoteFile>();
  for (const href of parser.parseFiles(html)) {
    const resolved = resolveHref(href, folderUrl);
    if (!resolved.ok) {
      logger.warn("Skipping listing entry", { href, reason: resolved.reason, folderUrl });
      continue;
    }
    if (!byName.has(resolved.file.name)) byName.set(resolved.file.name, resolved.file);
  }

  if (byName.size === 0) {
    throw noFilesFound(folderUrl);
  }

  return [...byName.values()];
}

export function summarize(
  folderUrl: string,
  destinationDir: string,
  entries: FetchEntry[],
  durationMs: number
): FetchSummary {
  const counts: RunCounts = { skipped: 0, succeeded: 0, failed: 0 };
  let totalBytes = 0;
  let downloadedBytes = 0;

  for (const entry of entries) {
    counts[entry.status]++;
    if (entry.status !== "failed") totalBytes += entry.bytes;
    if (entry.status === "succeeded") downloadedBytes += entry.bytes;
  }

  return { folderUrl, destinationDir, entries, counts, totalBytes, downloadedBytes, durationMs };
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the sequential download orchestrator.
 * Files are fetched strictly one at a time; each gets `maxRetries`
 * attempts with linear backoff between them.
 */
export function createFetchOrchestrator(options: OrchestratorOptions): FetchOrchestrator {
  const {
    downloader,
    listing,
    timeoutMs,
    maxRetries,
    backoff = linearBackoff(),
    parser = regexListingParser,
    strictSize = false,
    verifyExisting = false,
    logger = createNoopLogger(),
    delay = realDelay,
    clock = systemClock,
    onEvent,
    onProgress,
    signal,
  } = options;

  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new RangeError(`maxRetries must be a positive integer, got ${maxRetries}`);
  }

  function throwIfCancelled(): void {
    if (signal?.aborted) throw cancelled();
  }

  async function listFiles(folderUrl: string): Promise<RemoteFile[]> {
    logger.debug("Fetching folder listing", { url: folderUrl });
    const files = await listFolderFiles(folderUrl, { listing, timeoutMs, parser, logger, signal });
    onEvent?.({ type: "FilesListed", url: folderUrl, count: files.length });
    return files;
  }

  /**
   * True when the file on disk may be kept as is.
   */
  async function keepExisting(file: RemoteFile, localBytes: number, log: Logger): Promise<boolean> {
    if (!verifyExisting) return true;

    let remoteBytes: number | null;
    try {
      remoteBytes = await downloader.headSize(file.url, { timeoutMs, signal });
    } catch (error) {
      if (hasCode(error, "CANCELLED")) throw error;
      log.warn("Could not verify existing file, keeping it", {
        localBytes,
        error: unknownError(error).message,
      });
      return true;
    }

    if (remoteBytes === null || remoteBytes === localBytes) return true;

    log.warn("Existing file differs from remote size, downloading again", {
      localBytes,
      remoteBytes,
    });
    return false;
  }

  async function attemptOnce(file: RemoteFile, path: string, attempt: number): Promise<DownloadResult> {
    onEvent?.({ type: "AttemptStarted", name: file.name, attempt, maxAttempts: maxRetries });

    const result = await downloader.downloadOnce(file.url, path, {
      timeoutMs,
      signal,
      onProgress: onProgress && ((bytes, expected) => onProgress(file.name, bytes, expected)),
    });

    if (result.verified === false && result.expectedBytes !== null) {
      onEvent?.({
        type: "SizeMismatch",
        name: file.name,
        expectedBytes: result.expectedBytes,
        actualBytes: result.actualBytes,
      });
      logger.warn("Downloaded size differs from Content-Length", {
        file: file.name,
        expectedBytes: result.expectedBytes,
        actualBytes: result.actualBytes,
        strictSize,
      });

      if (strictSize) {
        await removeFile(path);
        throw sizeMismatch(file.name, result.expectedBytes, result.actualBytes);
      }
    }

    return result;
  }

  /**
   * Advance the task by one transition.
   */
  async function step(state: ActiveState, file: RemoteFile, path: string): Promise<TaskState> {
    if (state.kind === "pending") {
      return { kind: "attempting", attempt: 1 };
    }

    const { attempt } = state;
    const log = logger.child({ file: file.name, attempt });

    try {
      const result = await attemptOnce(file, path, attempt);
      return { kind: "succeeded", attempts: attempt, result };
    } catch (error) {
      const failure = unknownError(error);
      if (failure.code === "CANCELLED") throw failure;

      if (attempt >= maxRetries || !isRetryable(failure)) {
        log.error("Attempt failed, giving up", { code: failure.code, error: failure.message });
        onEvent?.({
          type: "AttemptFailed",
          name: file.name,
          attempt,
          code: failure.code,
          error: failure.message,
        });
        return { kind: "failed", attempts: attempt, error: failure };
      }

      const retryInMs = backoff(attempt + 1);
      log.warn("Attempt failed, scheduling retry", {
        code: failure.code,
        error: failure.message,
        maxRetries,
        retryDelayMs: retryInMs,
      });
      onEvent?.({
        type: "AttemptFailed",
        name: file.name,
        attempt,
        code: failure.code,
        error: failure.message,
        retryInMs,
      });

      await delay(retryInMs, signal);
      return { kind: "attempting", attempt: attempt + 1 };
    }
  }

  async function runTask(file: RemoteFile, path: string): Promise<SettledState> {
    let state: TaskState = { kind: "pending" };
    while (state.kind === "pending" || state.kind === "attempting") {
      state = await step(state, file, path);
    }
    return state;
  }

  async function processFile(file: RemoteFile, destinationDir: string): Promise<FetchEntry> {
    const path = join(destinationDir, file.name);
    const log = logger.child({ file: file.name });
    const base = { name: file.name, url: file.url, path };

    let localBytes: number | null;
    try {
      localBytes = await localFileSize(path);
    } catch (error) {
      const failure = fileCheckFailed(path, errorMessage(error), error);
      log.error("Could not inspect local file", { path, error: failure.message });
      onEvent?.({
        type: "FileFailed",
        name: file.name,
        attempts: 0,
        code: failure.code,
        error: failure.message,
      });
      return { ...base, status: "failed", bytes: 0, attempts: 0, code: failure.code, error: failure.message };
    }

    if (localBytes !== null && localBytes > 0 && (await keepExisting(file, localBytes, log))) {
      log.debug("File already present, skipping", { bytes: localBytes });
      onEvent?.({ type: "FileSkipped", name: file.name, path, bytes: localBytes });
      return { ...base, status: "skipped", bytes: localBytes, attempts: 0 };
    }

    const outcome = await runTask(file, path);

    if (outcome.kind === "succeeded") {
      const { result, attempts } = outcome;
      log.debug("File downloaded", { bytes: result.actualBytes, attempts, verified: result.verified });
      onEvent?.({
        type: "FileSucceeded",
        name: file.name,
        path,
        bytes: result.actualBytes,
        attempts,
        verified: result.verified,
      });
      return {
        ...base,
        status: "succeeded",
        bytes: result.actualBytes,
        attempts,
        expectedBytes: result.expectedBytes,
        verified: result.verified,
      };
    }

    const { error, attempts } = outcome;
    onEvent?.({
      type: "FileFailed",
      name: file.name,
      attempts,
      code: error.code,
      error: error.message,
    });
    return { ...base, status: "failed", bytes: 0, attempts, code: error.code, error: error.message };
  }

  async function fetchFiles(
    files: RemoteFile[],
    destinationDir: string,
    folderUrl = ""
  ): Promise<FetchSummary> {
    const startedAt = clock.now();
    const entries: FetchEntry[] = [];

    for (const file of files) {
      throwIfCancelled();
      entries.push(await processFile(file, destinationDir));
    }

    return summarize(folderUrl, destinationDir, entries, clock.now() - startedAt);
  }

  async function fetchAll(folderUrl: string, destinationDir: string): Promise<FetchSummary> {
    const files = await listFiles(folderUrl);
    return fetchFiles(files, destinationDir, folderUrl);
  }

  return { listFiles, fetchFiles, fetchAll };
}
