import chalk from "chalk";
import { FetchError, isFetchError } from "./types.js";
import { unknownError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";

export type ErrorOutputMode = "static" | "json";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Lines of a human-readable error block.
 */
export function formatStaticError(error: FetchError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  output.push("");
  return output;
}

/**
 * JSON shape of an error; undefined fields are dropped.
 */
export function toErrorJson(error: FetchError): Record<string, unknown> {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    details: error.details,
    url: error.url,
    file: error.file,
  };

  return Object.fromEntries(Object.entries(output).filter(([, v]) => v !== undefined));
}

/**
 * Render an error to stderr in the current output mode.
 */
export function renderError(error: FetchError, mode?: ErrorOutputMode): void {
  const outputMode = mode ?? (isJsonMode() ? "json" : "static");

  if (outputMode === "json") {
    console.error(JSON.stringify(toErrorJson(error), null, 2));
    return;
  }

  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a FetchError and render it.
 */
export function renderUnknownError(error: unknown, mode?: ErrorOutputMode): void {
  renderError(isFetchError(error) ? error : unknownError(error), mode);
}
