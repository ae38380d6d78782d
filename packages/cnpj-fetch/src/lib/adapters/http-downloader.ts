import fetch, { type RequestInit, type Response } from "node-fetch";
import { createWriteStream, type WriteStream } from "fs";
import { rm } from "fs/promises";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import type {
  DownloadOptions,
  DownloadResult,
  FileDownloader,
  HeadOptions,
} from "../ports/download.js";
import type { TimerService } from "../ports/timer.js";
import { realTimerService } from "./real-timers.js";
import { createDeadline, type Deadline } from "../deadline.js";
import { createNoopLogger, type Logger } from "../logger.js";
import {
  cancelled,
  errorMessage,
  transferFailed,
  transferTimeout,
} from "../errors/catalog.js";
import { FetchError, isFetchError } from "../errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpDownloaderOptions {
  fetchImpl?: FetchFn;
  timers?: TimerService;
  logger?: Logger;
  userAgent?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_USER_AGENT = "cnpj-fetch";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse a Content-Length header.
 * Missing, empty, negative or non-numeric values mean "unknown".
 */
export function parseContentLength(header: string | null): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : null;
}

function whenClosed(stream: WriteStream): Promise<void> {
  if (stream.closed) return Promise.resolve();
  return new Promise((resolve) => stream.once("close", () => resolve()));
}

function classifyFailure(
  error: unknown,
  url: string,
  timeoutMs: number,
  deadline: Deadline
): FetchError {
  if (deadline.cancelled()) return cancelled();
  if (deadline.expired()) return transferTimeout(url, timeoutMs);
  if (isFetchError(error)) return error;
  return transferFailed(url, errorMessage(error), error);
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a file downloader backed by node-fetch.
 *
 * Each attempt is one GET: status and Content-Length are read from the
 * headers, then the body is streamed to disk. The timeout bounds the wait
 * for headers and every idle gap between body chunks. On any failure the
 * destination file is removed before the error propagates.
 */
export function createHttpDownloader(options: HttpDownloaderOptions = {}): FileDownloader {
  const {
    fetchImpl = fetch,
    timers = realTimerService,
    logger = createNoopLogger(),
    userAgent = DEFAULT_USER_AGENT,
  } = options;

  async function downloadOnce(
    url: string,
    destinationPath: string,
    { timeoutMs, onProgress, signal }: DownloadOptions
  ): Promise<DownloadResult> {
    if (signal?.aborted) throw cancelled();

    const deadline = createDeadline(timeoutMs, { parent: signal, timers });
    let expectedBytes: number | null = null;
    let actualBytes = 0;
    let file: WriteStream | undefined;

    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        actualBytes += chunk.length;
        deadline.touch();
        onProgress?.(actualBytes, expectedBytes);
        callback(null, chunk);
      },
    });

    const stopBody = () => {
      counter.destroy(deadline.expired() ? transferTimeout(url, timeoutMs) : cancelled());
    };
    deadline.signal.addEventListener("abort", stopBody, { once: true });

    try {
      const response = await fetchImpl(url, {
        signal: deadline.signal,
        compress: false,
        headers: { "User-Agent": userAgent },
      });

      if (!response.ok) {
        response.body?.resume();
        throw transferFailed(url, `HTTP ${response.status} ${response.statusText}`.trim());
      }
      if (!response.body) {
        throw transferFailed(url, "response has no body");
      }

      expectedBytes = parseContentLength(response.headers.get("content-length"));
      logger.debug("Transfer started", { url, destinationPath, expectedBytes });

      deadline.touch();
      file = createWriteStream(destinationPath);
      await pipeline(response.body, counter, file);
    } catch (error) {
      if (file) await whenClosed(file);
      await rm(destinationPath, { force: true });
      const failure = classifyFailure(error, url, timeoutMs, deadline);
      logger.debug("Transfer failed, partial file removed", {
        url,
        destinationPath,
        bytesWritten: actualBytes,
        code: failure.code,
        error: failure.message,
      });
      throw failure;
    } finally {
      deadline.signal.removeEventListener("abort", stopBody);
      deadline.dispose();
    }

    const verified = expectedBytes === null ? "unknown" : expectedBytes === actualBytes;
    logger.debug("Transfer complete", { url, expectedBytes, actualBytes, verified });

    return { url, path: destinationPath, expectedBytes, actualBytes, verified };
  }

  async function headSize(url: string, { timeoutMs, signal }: HeadOptions): Promise<number | null> {
    if (signal?.aborted) throw cancelled();

    const deadline = createDeadline(timeoutMs, { parent: signal, timers });
    try {
      const response = await fetchImpl(url, {
        method: "HEAD",
        signal: deadline.signal,
        compress: false,
        headers: { "User-Agent": userAgent },
      });
      if (!response.ok) {
        throw transferFailed(url, `HEAD returned HTTP ${response.status} ${response.statusText}`.trim());
      }
      return parseContentLength(response.headers.get("content-length"));
    } catch (error) {
      throw classifyFailure(error, url, timeoutMs, deadline);
    } finally {
      deadline.dispose();
    }
  }

  return { downloadOnce, headSize };
}
