import { describe, it, expect, vi } from "vitest";
import { Response } from "node-fetch";
import { createHttpListingFetcher } from "./http-listing.js";
import type { FetchFn } from "./http-downloader.js";

const ROOT = "https://portal.test/dados/";

describe("createHttpListingFetcher", () => {
  it("returns the page body", async () => {
    const fetchImpl = vi.fn<FetchFn>().mockResolvedValue(
      new Response('<a href="2024-07/">2024-07/</a>', { status: 200 })
    );
    const listing = createHttpListingFetcher({ fetchImpl });

    await expect(listing.fetchText(ROOT, { timeoutMs: 5000 })).resolves.toBe(
      '<a href="2024-07/">2024-07/</a>'
    );
    expect(fetchImpl).toHaveBeenCalledWith(
      ROOT,
      expect.objectContaining({ headers: { "User-Agent": "cnpj-fetch" } })
    );
  });

  it("maps a non-2xx status to LISTING_FETCH_FAILED", async () => {
    const fetchImpl = vi.fn<FetchFn>().mockResolvedValue(
      new Response("unavailable", { status: 503, statusText: "Service Unavailable" })
    );
    const listing = createHttpListingFetcher({ fetchImpl });

    await expect(listing.fetchText(ROOT, { timeoutMs: 5000 })).rejects.toMatchObject({
      code: "LISTING_FETCH_FAILED",
      message: `Couldn't load the listing at ${ROOT}`,
      details: "HTTP 503 Service Unavailable",
      url: ROOT,
    });
  });

  it("maps network errors to LISTING_FETCH_FAILED with the cause", async () => {
    const cause = new Error("getaddrinfo ENOTFOUND portal.test");
    const fetchImpl = vi.fn<FetchFn>().mockRejectedValue(cause);
    const listing = createHttpListingFetcher({ fetchImpl });

    const error = await listing.fetchText(ROOT, { timeoutMs: 5000 }).catch((e: unknown) => e);

    expect(error).toMatchObject({
      code: "LISTING_FETCH_FAILED",
      details: "getaddrinfo ENOTFOUND portal.test",
      cause,
    });
  });

  it("reports a timeout when the server never answers", async () => {
    const fetchImpl = vi.fn<FetchFn>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const listing = createHttpListingFetcher({ fetchImpl });

    vi.useFakeTimers();
    try {
      const assertion = expect(listing.fetchText(ROOT, { timeoutMs: 2000 })).rejects.toMatchObject({
        code: "LISTING_FETCH_FAILED",
        details: "timed out after 2s",
      });
      await vi.advanceTimersByTimeAsync(2000);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it("reports cancellation as CANCELLED", async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<FetchFn>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          controller.abort();
        })
    );
    const listing = createHttpListingFetcher({ fetchImpl });

    await expect(
      listing.fetchText(ROOT, { timeoutMs: 5000, signal: controller.signal })
    ).rejects.toMatchObject({ code: "CANCELLED" });
  });
});
