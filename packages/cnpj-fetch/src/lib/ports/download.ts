/**
 * Result of one completed transfer.
 * `verified` is "unknown" when the server sent no usable Content-Length.
 */
export interface DownloadResult {
  url: string;
  path: string;
  expectedBytes: number | null;
  actualBytes: number;
  verified: boolean | "unknown";
}

export interface DownloadOptions {
  /** Connect timeout and maximum idle gap between body chunks */
  timeoutMs: number;
  /** Called after every chunk with the running byte count */
  onProgress?: (bytes: number, expectedBytes: number | null) => void;
  signal?: AbortSignal;
}

export interface HeadOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Single-attempt file transfer.
 * Implementations never leave a partial file at the destination when they throw.
 */
export interface FileDownloader {
  downloadOnce(
    url: string,
    destinationPath: string,
    options: DownloadOptions
  ): Promise<DownloadResult>;
  /** Remote size from a HEAD request, or null when the server does not say */
  headSize(url: string, options: HeadOptions): Promise<number | null>;
}
