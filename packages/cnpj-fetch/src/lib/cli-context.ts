/**
 * Global CLI context for output options shared by every command.
 */

export interface CLIContext {
  /** Output NDJSON events and JSON results instead of human-readable text */
  json: boolean;
  /** Suppress spinners and per-file progress lines */
  quiet: boolean;
  /** Enable debug logging */
  verbose: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  verbose: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || isTruthyEnv(env.CNPJ_FETCH_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || isTruthyEnv(env.CNPJ_FETCH_QUIET)) {
    currentContext.quiet = true;
  }

  if (argv.includes("--verbose") || isTruthyEnv(env.CNPJ_FETCH_VERBOSE)) {
    currentContext.verbose = true;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
