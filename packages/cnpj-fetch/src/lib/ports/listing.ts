/**
 * Fetches directory index pages as text.
 */
export interface ListingFetcher {
  fetchText(
    url: string,
    options: { timeoutMs: number; signal?: AbortSignal }
  ): Promise<string>;
}
