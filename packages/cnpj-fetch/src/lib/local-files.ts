/**
 * Local filesystem checks for the download directory and its files.
 */

import { mkdir, rm, stat } from "fs/promises";
import { resolve } from "path";
import { directoryInvalid, errorMessage } from "./errors/catalog.js";

function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Size of a regular file, or null when nothing is there.
 */
export async function localFileSize(path: string): Promise<number | null> {
  try {
    const stats = await stat(path);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) return null;
    throw error;
  }
}

/**
 * Create the directory if needed (idempotent) and return its absolute path.
 */
export async function ensureDirectory(path: string): Promise<string> {
  const resolved = resolve(path);

  try {
    await mkdir(resolved, { recursive: true });
  } catch (error) {
    throw directoryInvalid(resolved, errorMessage(error), error);
  }

  const stats = await stat(resolved);
  if (!stats.isDirectory()) {
    throw directoryInvalid(resolved, "path exists and is not a directory");
  }

  return resolved;
}

/**
 * Delete a file if it exists.
 */
export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}
