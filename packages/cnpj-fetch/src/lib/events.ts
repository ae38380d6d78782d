/**
 * Structured events emitted while a run progresses.
 * Presentation layers (NDJSON, spinner, logs) subscribe through a listener.
 */

export interface RunCounts {
  skipped: number;
  succeeded: number;
  failed: number;
}

export type FetchEvent =
  | { type: "FolderResolved"; folder: string; url: string }
  | { type: "FilesListed"; url: string; count: number }
  | { type: "FileSkipped"; name: string; path: string; bytes: number }
  | { type: "AttemptStarted"; name: string; attempt: number; maxAttempts: number }
  | {
      type: "AttemptFailed";
      name: string;
      attempt: number;
      code: string;
      error: string;
      /** Delay before the next attempt; absent on the last one */
      retryInMs?: number;
    }
  | { type: "SizeMismatch"; name: string; expectedBytes: number; actualBytes: number }
  | {
      type: "FileSucceeded";
      name: string;
      path: string;
      bytes: number;
      attempts: number;
      verified: boolean | "unknown";
    }
  | { type: "FileFailed"; name: string; attempts: number; code: string; error: string }
  | {
      type: "RunSummary";
      totalBytes: number;
      downloadedBytes: number;
      counts: RunCounts;
      durationMs: number;
    };

export type FetchEventType = FetchEvent["type"];

export type FetchEventListener = (event: FetchEvent) => void;

/**
 * Progress of the transfer in flight, reported per chunk.
 */
export type ProgressListener = (name: string, bytes: number, expectedBytes: number | null) => void;
