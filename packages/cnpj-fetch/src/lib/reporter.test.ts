import { describe, it, expect, vi } from "vitest";

vi.mock("chalk", () => ({
  default: {
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

import { createReporter } from "./reporter.js";
import type { FetchEventJson } from "./json-output.js";
import type { Spinner } from "./spinner.js";

class FakeSpinner implements Spinner {
  text = "";
  isSpinning = false;
  readonly calls: string[] = [];

  start(text: string): void {
    this.isSpinning = true;
    this.calls.push(`start ${text}`);
  }

  stop(): void {
    this.isSpinning = false;
    this.calls.push("stop");
  }

  succeed(text: string): void {
    this.isSpinning = false;
    this.calls.push(`succeed ${text}`);
  }

  fail(text: string): void {
    this.isSpinning = false;
    this.calls.push(`fail ${text}`);
  }

  warn(text: string): void {
    this.isSpinning = false;
    this.calls.push(`warn ${text}`);
  }

  info(text: string): void {
    this.isSpinning = false;
    this.calls.push(`info ${text}`);
  }
}

describe("createReporter", () => {
  describe("json mode", () => {
    it("emits each event with a timestamp", () => {
      const lines: FetchEventJson[] = [];
      const reporter = createReporter({
        mode: "json",
        emit: (event) => lines.push(event),
        now: () => new Date("2024-07-14T10:00:00.000Z"),
      });

      reporter.onEvent({ type: "FilesListed", url: "https://portal.test/2024-07/", count: 37 });
      reporter.onProgress("a.zip", 10, 20);

      expect(lines).toEqual([
        {
          type: "FilesListed",
          url: "https://portal.test/2024-07/",
          count: 37,
          timestamp: "2024-07-14T10:00:00.000Z",
        },
      ]);
    });
  });

  describe("quiet mode", () => {
    it("writes nothing", () => {
      const consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      const reporter = createReporter({ mode: "quiet" });

      reporter.onEvent({ type: "FolderResolved", folder: "2024-07", url: "https://portal.test/2024-07/" });
      reporter.close();

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe("human mode", () => {
    it("persists one line per outcome", () => {
      const spinner = new FakeSpinner();
      const reporter = createReporter({ mode: "human", spinner });

      reporter.onEvent({ type: "FolderResolved", folder: "2024-07", url: "https://portal.test/2024-07/" });
      reporter.onEvent({ type: "FilesListed", url: "https://portal.test/2024-07/", count: 3 });
      reporter.onEvent({ type: "FileSkipped", name: "c.zip", path: "/d/c.zip", bytes: 512 });
      reporter.onEvent({ type: "AttemptStarted", name: "a.zip", attempt: 1, maxAttempts: 3 });
      reporter.onEvent({
        type: "AttemptFailed",
        name: "a.zip",
        attempt: 1,
        code: "TRANSFER_FAILED",
        error: "HTTP 500",
        retryInMs: 20_000,
      });
      reporter.onEvent({ type: "AttemptStarted", name: "a.zip", attempt: 2, maxAttempts: 3 });
      reporter.onEvent({
        type: "FileSucceeded",
        name: "a.zip",
        path: "/d/a.zip",
        bytes: 1536,
        attempts: 2,
        verified: true,
      });
      reporter.onEvent({ type: "AttemptStarted", name: "b.zip", attempt: 1, maxAttempts: 1 });
      reporter.onEvent({
        type: "AttemptFailed",
        name: "b.zip",
        attempt: 1,
        code: "TRANSFER_FAILED",
        error: "boom",
      });
      reporter.onEvent({ type: "FileFailed", name: "b.zip", attempts: 1, code: "TRANSFER_FAILED", error: "boom" });
      reporter.onEvent({
        type: "RunSummary",
        totalBytes: 2048,
        downloadedBytes: 1536,
        counts: { skipped: 1, succeeded: 1, failed: 1 },
        durationMs: 1000,
      });

      expect(spinner.calls).toEqual([
        "info Release folder 2024-07 https://portal.test/2024-07/",
        "info 3 files listed",
        "info c.zip already present (512 B)",
        "start a.zip",
        "warn a.zip: HTTP 500, retrying in 20s",
        "start a.zip attempt 2/3",
        "succeed a.zip 1.5 KB",
        "start b.zip",
        "fail b.zip failed after 1 attempt: boom",
        "stop",
      ]);
    });

    it("warns about size mismatches", () => {
      const spinner = new FakeSpinner();
      const reporter = createReporter({ mode: "human", spinner });

      reporter.onEvent({ type: "SizeMismatch", name: "a.zip", expectedBytes: 100, actualBytes: 90 });

      expect(spinner.calls).toEqual(["warn a.zip: expected 100 bytes, got 90"]);
    });

    it("shows transfer progress only while spinning", () => {
      const spinner = new FakeSpinner();
      const reporter = createReporter({ mode: "human", spinner });

      reporter.onProgress("a.zip", 512, 1536);
      expect(spinner.text).toBe("");

      reporter.onEvent({ type: "AttemptStarted", name: "a.zip", attempt: 1, maxAttempts: 3 });
      reporter.onProgress("a.zip", 512, 1536);
      expect(spinner.text).toBe("a.zip 512 B / 1.5 KB");

      reporter.onProgress("a.zip", 2048, null);
      expect(spinner.text).toBe("a.zip 2.0 KB");
    });

    it("stops a running spinner on close", () => {
      const spinner = new FakeSpinner();
      const reporter = createReporter({ mode: "human", spinner });

      reporter.close();
      expect(spinner.calls).toEqual([]);

      reporter.onEvent({ type: "AttemptStarted", name: "a.zip", attempt: 1, maxAttempts: 3 });
      reporter.close();
      expect(spinner.calls).toEqual(["start a.zip", "stop"]);
    });
  });
});
