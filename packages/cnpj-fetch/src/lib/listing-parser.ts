/**
 * Directory index scraping.
 *
 * Works on the raw HTML text of an auto-generated index page by matching
 * anchor hrefs; no DOM is built, so truncated or malformed markup simply
 * yields fewer matches.
 */

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

/** Top-level year-month release folders, e.g. href="2024-07/" */
export const FOLDER_PATTERN = /href="(\d{4}-\d{2})\/"/g;

/** Archive files; lazy up to the first .zip or .txt, lowercase only */
export const FILE_PATTERN = /href="(.*?\.(?:zip|txt))"/g;

const FOLDER_TOKEN = /^\d{4}-\d{2}$/;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Strategy for pulling child names out of a listing page.
 */
export interface ListingParser {
  /** Release folder tokens (yyyy-mm), first-seen order, no duplicates */
  parseFolders(html: string): string[];
  /** File hrefs, first-seen order, no duplicates */
  parseFiles(html: string): string[];
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function countCaptureGroups(pattern: RegExp): number {
  // An empty alternative always matches, exposing one slot per group
  const match = new RegExp(`${pattern.source}|`).exec("");
  return match ? match.length - 1 : 0;
}

/**
 * Collect the capture group of every match of `pattern` in `html`.
 * Keeps first-seen order and drops exact duplicates.
 *
 * @throws TypeError when the pattern does not have exactly one capturing group
 */
export function extractMatches(html: string, pattern: RegExp): string[] {
  const groups = countCaptureGroups(pattern);
  if (groups !== 1) {
    throw new TypeError(
      `Listing pattern must have exactly one capturing group, found ${groups}: ${pattern.source}`
    );
  }

  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  const seen = new Set<string>();

  for (const match of html.matchAll(new RegExp(pattern.source, flags))) {
    const value = match[1];
    if (value !== undefined) {
      seen.add(value);
    }
  }

  return [...seen];
}

export function isFolderToken(value: string): boolean {
  return FOLDER_TOKEN.test(value);
}

/**
 * Default parser: regular expressions over anchor hrefs.
 */
export const regexListingParser: ListingParser = {
  parseFolders: (html) => extractMatches(html, FOLDER_PATTERN),
  parseFiles: (html) => extractMatches(html, FILE_PATTERN),
};
