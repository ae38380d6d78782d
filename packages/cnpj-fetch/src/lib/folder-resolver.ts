import type { ListingFetcher } from "./ports/listing.js";
import { regexListingParser, type ListingParser } from "./listing-parser.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { folderNotFound, noFoldersFound } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolvedFolder {
  /** Folder token, e.g. "2024-07" */
  name: string;
  /** Absolute folder URL ending in "/" */
  url: string;
  /** Every folder found on the listing, newest first */
  candidates: string[];
}

export interface FolderResolverOptions {
  listing: ListingFetcher;
  timeoutMs: number;
  parser?: ListingParser;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface FolderResolver {
  /** All release folders on the root listing, newest first */
  listFolders(baseUrl: string): Promise<string[]>;
  /** The newest folder, or `pinned` when given and present */
  resolve(baseUrl: string, pinned?: string): Promise<ResolvedFolder>;
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

export function normalizeBaseUrl(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Descending string order. Tokens are zero-padded yyyy-mm, so this is
 * also newest-first chronological order.
 */
export function newestFirst(tokens: readonly string[]): string[] {
  return [...tokens].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createFolderResolver(options: FolderResolverOptions): FolderResolver {
  const {
    listing,
    timeoutMs,
    parser = regexListingParser,
    logger = createNoopLogger(),
    signal,
  } = options;

  async function listFolders(baseUrl: string): Promise<string[]> {
    const root = normalizeBaseUrl(baseUrl);
    logger.debug("Fetching root listing", { url: root });

    const html = await listing.fetchText(root, { timeoutMs, signal });
    const folders = parser.parseFolders(html);

    if (folders.length === 0) {
      throw noFoldersFound(root);
    }

    return newestFirst(folders);
  }

  async function resolve(baseUrl: string, pinned?: string): Promise<ResolvedFolder> {
    const root = normalizeBaseUrl(baseUrl);
    const candidates = await listFolders(root);

    if (pinned !== undefined && !candidates.includes(pinned)) {
      throw folderNotFound(pinned, candidates);
    }

    const name = pinned ?? candidates[0];
    const resolved = { name, url: `${root}${name}/`, candidates };

    logger.debug("Release folder resolved", {
      folder: name,
      url: resolved.url,
      pinned: pinned !== undefined,
      available: candidates.length,
    });

    return resolved;
  }

  return { listFolders, resolve };
}
