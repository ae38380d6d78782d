import chalk from "chalk";
import type { FetchEvent, FetchEventListener, ProgressListener } from "./events.js";
import { outputNdjson, toEventJson, type FetchEventJson } from "./json-output.js";
import { createSpinner, type Spinner } from "./spinner.js";
import { formatBytes } from "./summary.js";

export type ReporterMode = "human" | "json" | "quiet";

export interface ReporterOptions {
  mode: ReporterMode;
  spinner?: Spinner;
  /** NDJSON line writer */
  emit?: (event: FetchEventJson) => void;
  now?: () => Date;
}

export interface Reporter {
  onEvent: FetchEventListener;
  onProgress: ProgressListener;
  /** Stop any spinner still running */
  close(): void;
}

function progressText(name: string, bytes: number, expected: number | null): string {
  const total = expected === null ? "" : ` / ${formatBytes(expected)}`;
  return `${name} ${chalk.gray(`${formatBytes(bytes)}${total}`)}`;
}

function humanLine(spinner: Spinner, event: FetchEvent): void {
  switch (event.type) {
    case "FolderResolved":
      spinner.info(`Release folder ${chalk.bold(event.folder)} ${chalk.gray(event.url)}`);
      break;
    case "FilesListed":
      spinner.info(`${event.count} files listed`);
      break;
    case "FileSkipped":
      spinner.info(`${event.name} ${chalk.gray(`already present (${formatBytes(event.bytes)})`)}`);
      break;
    case "AttemptStarted":
      spinner.start(
        event.attempt === 1
          ? event.name
          : `${event.name} ${chalk.gray(`attempt ${event.attempt}/${event.maxAttempts}`)}`
      );
      break;
    case "AttemptFailed":
      if (event.retryInMs !== undefined) {
        spinner.warn(
          `${event.name}: ${event.error}, retrying in ${Math.round(event.retryInMs / 1000)}s`
        );
      }
      break;
    case "SizeMismatch":
      spinner.warn(
        `${event.name}: expected ${event.expectedBytes} bytes, got ${event.actualBytes}`
      );
      break;
    case "FileSucceeded":
      spinner.succeed(`${event.name} ${chalk.gray(formatBytes(event.bytes))}`);
      break;
    case "FileFailed":
      spinner.fail(
        `${event.name} failed after ${event.attempts} attempt${event.attempts === 1 ? "" : "s"}: ${event.error}`
      );
      break;
    case "RunSummary":
      spinner.stop();
      break;
  }
}

/**
 * Turn pipeline events into terminal output.
 *
 * - json: one NDJSON line per event, no progress
 * - human: spinner with one persisted line per outcome
 * - quiet: nothing
 */
export function createReporter(options: ReporterOptions): Reporter {
  const { mode, emit = outputNdjson, now = () => new Date() } = options;

  if (mode === "json") {
    return {
      onEvent: (event) => emit(toEventJson(event, now())),
      onProgress: () => {},
      close: () => {},
    };
  }

  if (mode === "quiet") {
    return { onEvent: () => {}, onProgress: () => {}, close: () => {} };
  }

  const spinner = options.spinner ?? createSpinner();

  return {
    onEvent: (event) => humanLine(spinner, event),
    onProgress: (name, bytes, expected) => {
      if (spinner.isSpinning) spinner.text = progressText(name, bytes, expected);
    },
    close: () => {
      if (spinner.isSpinning) spinner.stop();
    },
  };
}
