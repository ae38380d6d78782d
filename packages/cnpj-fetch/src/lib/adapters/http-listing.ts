import fetch from "node-fetch";
import type { ListingFetcher } from "../ports/listing.js";
import type { TimerService } from "../ports/timer.js";
import { realTimerService } from "./real-timers.js";
import { DEFAULT_USER_AGENT, type FetchFn } from "./http-downloader.js";
import { createDeadline } from "../deadline.js";
import { cancelled, errorMessage, listingFetchFailed } from "../errors/catalog.js";
import { isFetchError } from "../errors/types.js";

export interface HttpListingOptions {
  fetchImpl?: FetchFn;
  timers?: TimerService;
  userAgent?: string;
}

/**
 * Fetch directory index pages over HTTP.
 * Every failure surfaces as LISTING_FETCH_FAILED naming the URL, except cancellation.
 */
export function createHttpListingFetcher(options: HttpListingOptions = {}): ListingFetcher {
  const {
    fetchImpl = fetch,
    timers = realTimerService,
    userAgent = DEFAULT_USER_AGENT,
  } = options;

  return {
    async fetchText(url, { timeoutMs, signal }) {
      if (signal?.aborted) throw cancelled();

      const deadline = createDeadline(timeoutMs, { parent: signal, timers });
      try {
        const response = await fetchImpl(url, {
          signal: deadline.signal,
          headers: { "User-Agent": userAgent },
        });

        if (!response.ok) {
          response.body?.resume();
          throw listingFetchFailed(url, `HTTP ${response.status} ${response.statusText}`.trim());
        }

        return await response.text();
      } catch (error) {
        if (deadline.cancelled()) throw cancelled();
        if (deadline.expired()) {
          throw listingFetchFailed(url, `timed out after ${Math.round(timeoutMs / 1000)}s`, error);
        }
        if (isFetchError(error)) throw error;
        throw listingFetchFailed(url, errorMessage(error), error);
      } finally {
        deadline.dispose();
      }
    },
  };
}
