/**
 * Error codes for every failure the fetch pipeline can report.
 * Each code maps to a specific scenario with predefined messaging.
 */
export type ErrorCode =
  // Remote listing errors
  | "LISTING_FETCH_FAILED"
  | "NO_FOLDERS_FOUND"
  | "NO_FILES_FOUND"
  | "FOLDER_NOT_FOUND"
  // Transfer errors
  | "TRANSFER_FAILED"
  | "TRANSFER_TIMEOUT"
  | "SIZE_MISMATCH"
  // Local filesystem
  | "DIRECTORY_INVALID"
  | "FILE_CHECK_FAILED"
  // Validation errors
  | "VALIDATION_CONFIG_INVALID"
  | "VALIDATION_INVALID_OPTION"
  // Run control
  | "CANCELLED"
  // Generic
  | "UNKNOWN_ERROR";

export interface FetchErrorOptions {
  suggestion?: string;
  details?: string;
  /** Remote URL involved, when there is one */
  url?: string;
  /** Local file name involved, when there is one */
  file?: string;
  cause?: unknown;
}

/**
 * Error raised by the fetch pipeline, carrying enough context to
 * diagnose the failure without the underlying network exception.
 */
export class FetchError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly details?: string;
  readonly url?: string;
  readonly file?: string;

  constructor(code: ErrorCode, message: string, options: FetchErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.details = options.details;
    this.url = options.url;
    this.file = options.file;
  }
}

/**
 * Type guard to check if an error is a FetchError.
 */
export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function hasCode(error: unknown, code: ErrorCode): boolean {
  return isFetchError(error) && error.code === code;
}
