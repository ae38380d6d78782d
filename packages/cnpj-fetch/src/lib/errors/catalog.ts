import { basename } from "path";
import { FetchError, isFetchError, type ErrorCode } from "./types.js";

/**
 * Error catalog - factory functions for creating FetchErrors.
 * Each function produces a consistent, user-facing message.
 */

// ============================================================================
// Listing Errors
// ============================================================================

export function listingFetchFailed(
  url: string,
  reason: string,
  cause?: unknown
): FetchError {
  return new FetchError("LISTING_FETCH_FAILED", `Couldn't load the listing at ${url}`, {
    suggestion: "Check the base URL and your connection, then run again",
    details: reason,
    url,
    cause,
  });
}

export function noFoldersFound(url: string): FetchError {
  return new FetchError("NO_FOLDERS_FOUND", `No release folders found at ${url}`, {
    suggestion: "The portal layout may have changed. Expected links like 2024-07/",
    url,
  });
}

export function noFilesFound(url: string): FetchError {
  return new FetchError("NO_FILES_FOUND", `No .zip or .txt files found at ${url}`, {
    suggestion: "The release may still be publishing. Try again later or pin an older --folder",
    url,
  });
}

export function folderNotFound(folder: string, available: string[]): FetchError {
  const recent = available.slice(0, 5).join(", ");
  return new FetchError("FOLDER_NOT_FOUND", `Release folder "${folder}" is not on the portal`, {
    suggestion: recent
      ? `Most recent folders: ${recent}`
      : "Run `cnpj-fetch list` to see available folders",
  });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function transferFailed(url: string, reason: string, cause?: unknown): FetchError {
  return new FetchError("TRANSFER_FAILED", `Download failed: ${reason}`, {
    url,
    file: fileNameOf(url),
    details: reason,
    cause,
  });
}

export function transferTimeout(url: string, timeoutMs: number): FetchError {
  const seconds = Math.round(timeoutMs / 1000);
  return new FetchError("TRANSFER_TIMEOUT", `No data received for ${seconds}s`, {
    suggestion: "The server may be slow. Raise --timeout or run again later",
    url,
    file: fileNameOf(url),
  });
}

export function sizeMismatch(file: string, expectedBytes: number, actualBytes: number): FetchError {
  return new FetchError(
    "SIZE_MISMATCH",
    `Size mismatch for ${file}: expected ${expectedBytes} bytes, got ${actualBytes}`,
    { file }
  );
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function directoryInvalid(path: string, reason: string, cause?: unknown): FetchError {
  return new FetchError("DIRECTORY_INVALID", `Can't use "${path}" as the download directory`, {
    suggestion: "Pass a writable directory with --download-dir",
    details: reason,
    cause,
  });
}

export function fileCheckFailed(path: string, reason: string, cause?: unknown): FetchError {
  return new FetchError("FILE_CHECK_FAILED", `Can't inspect ${path}`, {
    suggestion: "Check the permissions of the download directory",
    details: reason,
    file: basename(path),
    cause,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(
  optionName: string,
  reason: string,
  validValues?: string[]
): FetchError {
  return new FetchError("VALIDATION_INVALID_OPTION", `Invalid ${optionName}: ${reason}`, {
    suggestion: validValues?.length ? `Choose from: ${validValues.join(", ")}` : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): FetchError {
  const details = issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new FetchError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Run Control
// ============================================================================

export function cancelled(): FetchError {
  return new FetchError("CANCELLED", "Run cancelled", {
    suggestion: "Run again to resume. Completed files are skipped",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): FetchError {
  if (isFetchError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError("UNKNOWN_ERROR", message, { cause: error });
}

// ============================================================================
// Classification
// ============================================================================

const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "TRANSFER_FAILED",
  "TRANSFER_TIMEOUT",
  "SIZE_MISMATCH",
  "UNKNOWN_ERROR",
]);

/**
 * Whether another attempt at the same file could succeed.
 * Parsing and validation failures are deterministic; cancellation is final.
 */
export function isRetryable(error: unknown): boolean {
  if (!isFetchError(error)) return true;
  return RETRYABLE_CODES.has(error.code);
}

/**
 * Message of any thrown value, for log metadata.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fileNameOf(url: string): string | undefined {
  try {
    const segments = new URL(url).pathname.split("/");
    return segments.pop() || undefined;
  } catch {
    return undefined;
  }
}
