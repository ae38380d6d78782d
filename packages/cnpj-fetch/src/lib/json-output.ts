/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { FetchEvent } from "./events.js";
import type { RemoteFile } from "./fetch-orchestrator.js";
import type { PlannedFile } from "./pipeline.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

/** One NDJSON line of the fetch event stream */
export type FetchEventJson = FetchEvent & { timestamp: string };

export interface DryRunResultJson {
  folder: string;
  folderUrl: string;
  files: PlannedFile[];
}

export interface ListFoldersJson {
  baseUrl: string;
  latest: string;
  folders: string[];
}

export interface ListFilesJson {
  folder: string;
  folderUrl: string;
  files: RemoteFile[];
}

// ============================================================================
// Output Functions
// ============================================================================

export function toEventJson(event: FetchEvent, now: Date = new Date()): FetchEventJson {
  return { ...event, timestamp: now.toISOString() };
}

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (one object per line).
 */
export function outputNdjson(event: FetchEventJson): void {
  console.log(JSON.stringify(event));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
