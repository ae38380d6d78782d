import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { exitCodeFor, overridesFromFlags, registerFetchCommand, runFetch } from "./fetch.js";
import type { CommandDeps } from "./runtime.js";
import type { DownloadResult, FileDownloader, ListingFetcher, SignalHandler } from "../lib/ports/index.js";
import { cancelled, listingFetchFailed, noFoldersFound, transferFailed } from "../lib/errors/catalog.js";
import { initContext, resetContext } from "../lib/cli-context.js";

const BASE = "https://portal.test/cnpj/";

const PAGES: Record<string, string> = {
  [BASE]: '<a href="2024-06/">2024-06/</a>\n<a href="2024-07/">2024-07/</a>',
  [`${BASE}2024-07/`]: '<a href="a.zip">a.zip</a>\n<a href="b.txt">b.txt</a>',
};

const BODIES: Record<string, string> = {
  "a.zip": "alpha",
  "b.txt": "bravo!!",
};

class FakeSignalHandler implements SignalHandler {
  removed = false;
  private callbacks: Array<(signal: NodeJS.Signals) => void> = [];

  onShutdown(callback: (signal: NodeJS.Signals) => void): void {
    this.callbacks.push(callback);
  }

  removeAll(): void {
    this.removed = true;
    this.callbacks = [];
  }

  emit(signal: NodeJS.Signals): void {
    for (const callback of [...this.callbacks]) callback(signal);
  }
}

function fakeListing(): ListingFetcher {
  return {
    fetchText: vi.fn<ListingFetcher["fetchText"]>(async (url) => {
      const page = PAGES[url];
      if (page === undefined) throw listingFetchFailed(url, "HTTP 404 Not Found");
      return page;
    }),
  };
}

/** Writes the file body in one go, like a transfer that always completes */
function fakeDownloader(): FileDownloader {
  return {
    downloadOnce: vi.fn<FileDownloader["downloadOnce"]>(async (url, path) => {
      const name = url.slice(url.lastIndexOf("/") + 1);
      const body = BODIES[name] ?? "";
      await writeFile(path, body);
      const bytes = Buffer.byteLength(body);
      const result: DownloadResult = {
        url,
        path,
        expectedBytes: bytes,
        actualBytes: bytes,
        verified: true,
      };
      return result;
    }),
    headSize: vi.fn<FileDownloader["headSize"]>().mockResolvedValue(null),
  };
}

describe("overridesFromFlags", () => {
  it("converts flags into config values", () => {
    expect(
      overridesFromFlags({
        baseUrl: "https://portal.test/cnpj/",
        downloadDir: "/data/cnpj",
        timeout: "60",
        retries: "5",
        backoff: "0",
        folder: "2024-07",
        strictSize: true,
        verifyExisting: false,
      })
    ).toEqual({
      baseUrl: "https://portal.test/cnpj/",
      downloadDir: "/data/cnpj",
      timeoutSeconds: 60,
      maxRetries: 5,
      backoffSeconds: 0,
      folder: "2024-07",
      strictSize: true,
    });
  });

  it("returns nothing when no flags are given", () => {
    expect(overridesFromFlags({})).toEqual({});
  });

  it("rejects out-of-range values by flag name", () => {
    expect(() => overridesFromFlags({ retries: "0" })).toThrow(
      "Invalid --retries: must be between 1 and 20"
    );
    expect(() => overridesFromFlags({ folder: "latest" })).toThrow(
      'Invalid --folder: "latest" must look like yyyy-mm (e.g. 2024-07)'
    );
  });
});

describe("exitCodeFor", () => {
  const folder = { name: "2024-07", url: `${BASE}2024-07/`, candidates: ["2024-07"] };

  it("maps report outcomes to exit codes", () => {
    expect(exitCodeFor({ status: "planned", ok: true, folder, plan: [] })).toBe(0);
    expect(exitCodeFor({ status: "aborted", ok: false, error: noFoldersFound(BASE) })).toBe(1);
    expect(exitCodeFor({ status: "aborted", ok: false, folder, error: cancelled() })).toBe(130);
  });
});

describe("runFetch", () => {
  let root: string;
  let configPath: string;
  let downloadDir: string;
  let logLines: string[];
  let signalHandler: FakeSignalHandler;
  let deps: CommandDeps & { downloader: FileDownloader; listing: ListingFetcher };
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "cnpj-fetch-cmd-"));
    configPath = join(root, "config.yaml");
    downloadDir = join(root, "out");
    await writeFile(configPath, `source:\n  baseUrl: "${BASE}"\nlogging:\n  level: debug\n`);

    logLines = [];
    signalHandler = new FakeSignalHandler();
    deps = {
      downloader: fakeDownloader(),
      listing: fakeListing(),
      signalHandler,
      delay: vi.fn().mockResolvedValue(undefined),
      env: {},
      logSink: (_level, line) => logLines.push(line),
    };

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    initContext(["node", "cnpj-fetch", "--quiet"], {});
  });

  afterEach(async () => {
    resetContext();
    process.exitCode = undefined;
    await rm(root, { recursive: true, force: true });
  });

  it("downloads the latest release and prints the manifest", async () => {
    const code = await runFetch({ config: configPath, downloadDir }, deps);

    expect(code).toBe(0);
    expect(await readFile(join(downloadDir, "a.zip"), "utf-8")).toBe("alpha");
    expect(await readFile(join(downloadDir, "b.txt"), "utf-8")).toBe("bravo!!");
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleLogSpy.mock.calls[0][0])).toContain("b.txt");
    expect(signalHandler.removed).toBe(true);
    expect(logLines.some((line) => line.includes("Using release folder"))).toBe(true);
  });

  it("streams NDJSON events in JSON mode", async () => {
    initContext(["node", "cnpj-fetch", "--json"], {});

    const code = await runFetch({ config: configPath, downloadDir }, deps);
    const events = consoleLogSpy.mock.calls.map(([line]) => JSON.parse(String(line)));

    expect(code).toBe(0);
    expect(events.map((event) => event.type)).toEqual([
      "FolderResolved",
      "FilesListed",
      "AttemptStarted",
      "FileSucceeded",
      "AttemptStarted",
      "FileSucceeded",
      "RunSummary",
    ]);
    expect(events[0]).toMatchObject({ folder: "2024-07", url: `${BASE}2024-07/` });
    expect(typeof events[0].timestamp).toBe("string");
    expect(events[6]).toMatchObject({ totalBytes: 12, counts: { succeeded: 2, skipped: 0, failed: 0 } });
  });

  it("exits with 1 when a file fails", async () => {
    vi.mocked(deps.downloader.downloadOnce).mockImplementation(async (url, path) => {
      if (url.endsWith("b.txt")) throw transferFailed(url, "HTTP 500 Internal Server Error");
      await writeFile(path, "alpha");
      return { url, path, expectedBytes: 5, actualBytes: 5, verified: true };
    });

    const code = await runFetch({ config: configPath, downloadDir, retries: "1" }, deps);

    expect(code).toBe(1);
    expect(existsSync(join(downloadDir, "a.zip"))).toBe(true);
    expect(existsSync(join(downloadDir, "b.txt"))).toBe(false);
  });

  it("exits with 130 when interrupted", async () => {
    vi.mocked(deps.downloader.downloadOnce).mockImplementation(async (_url, _path, options) => {
      signalHandler.emit("SIGINT");
      if (options.signal?.aborted) throw cancelled();
      throw new Error("signal was not propagated");
    });

    const code = await runFetch({ config: configPath, downloadDir }, deps);

    expect(code).toBe(130);
    expect(deps.downloader.downloadOnce).toHaveBeenCalledTimes(1);
    expect(logLines.some((line) => line.includes("Received signal, cancelling run"))).toBe(true);
    expect(consoleErrorSpy.mock.calls.some(([line]) => String(line).includes("Run cancelled"))).toBe(
      true
    );
  });

  it("exits with 1 on an invalid flag without touching the network", async () => {
    const code = await runFetch({ config: configPath, downloadDir, timeout: "abc" }, deps);

    expect(code).toBe(1);
    expect(deps.listing.fetchText).not.toHaveBeenCalled();
    expect(consoleErrorSpy.mock.calls.some(([line]) => String(line).includes("Invalid --timeout"))).toBe(
      true
    );
  });

  it("prints the plan as JSON on a dry run", async () => {
    initContext(["node", "cnpj-fetch", "--json"], {});

    const code = await runFetch({ config: configPath, downloadDir, dryRun: true }, deps);
    const lines = consoleLogSpy.mock.calls.map(([line]) => String(line));

    expect(code).toBe(0);
    expect(deps.downloader.downloadOnce).not.toHaveBeenCalled();
    expect(existsSync(downloadDir)).toBe(false);
    expect(JSON.parse(lines[lines.length - 1])).toEqual({
      success: true,
      data: {
        folder: "2024-07",
        folderUrl: `${BASE}2024-07/`,
        files: [
          {
            name: "a.zip",
            url: `${BASE}2024-07/a.zip`,
            path: join(downloadDir, "a.zip"),
            localBytes: null,
            action: "download",
          },
          {
            name: "b.txt",
            url: `${BASE}2024-07/b.txt`,
            path: join(downloadDir, "b.txt"),
            localBytes: null,
            action: "download",
          },
        ],
      },
    });
  });

  it("runs as the default command", async () => {
    const program = new Command();
    program.exitOverride();
    registerFetchCommand(program, deps);

    await program.parseAsync(["node", "cnpj-fetch", "-c", configPath, "-d", downloadDir, "--folder", "2024-07"]);

    expect(process.exitCode).toBe(0);
    expect(deps.downloader.downloadOnce).toHaveBeenCalledTimes(2);
  });
});
