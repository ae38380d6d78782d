import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { errorMessage, invalidConfig, invalidOption } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { isFolderToken } from "./listing-parser.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/cnpj-fetch/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "cnpj-fetch", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  baseUrl: "https://arquivos.receitafederal.gov.br/dados/cnpj/dados_abertos_cnpj/",
  downloadDir: "./Downloads_CNPJ",
  timeoutSeconds: 300,
  maxRetries: 3,
  backoffSeconds: 10,
  strictSize: false,
  verifyExisting: false,
} as const;

export const LIMITS = {
  timeoutSeconds: { min: 1, max: 3600 },
  maxRetries: { min: 1, max: 20 },
  backoffSeconds: { min: 0, max: 600 },
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const FolderTokenSchema = z
  .string()
  .refine(isFolderToken, { message: "must look like yyyy-mm" });

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    source: z
      .object({
        baseUrl: z.string().url().optional(),
        folder: FolderTokenSchema.optional(),
      })
      .strict()
      .optional(),
    download: z
      .object({
        dir: z.string().min(1).optional(),
        timeoutSeconds: z
          .number()
          .int()
          .min(LIMITS.timeoutSeconds.min)
          .max(LIMITS.timeoutSeconds.max)
          .optional(),
        maxRetries: z
          .number()
          .int()
          .min(LIMITS.maxRetries.min)
          .max(LIMITS.maxRetries.max)
          .optional(),
        backoffSeconds: z
          .number()
          .int()
          .min(LIMITS.backoffSeconds.min)
          .max(LIMITS.backoffSeconds.max)
          .optional(),
      })
      .strict()
      .optional(),
    verification: z
      .object({
        strictSize: z.boolean().optional(),
        verifyExisting: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  baseUrl: string;
  /** Pinned release folder; latest when undefined */
  folder: string | undefined;
  downloadDir: string;
  timeoutSeconds: number;
  maxRetries: number;
  /** Delay before attempt n is backoffSeconds * n */
  backoffSeconds: number;
  /** Treat a Content-Length mismatch as a failed attempt */
  strictSize: boolean;
  /** Re-download existing files whose size differs from the remote one */
  verifyExisting: boolean;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Option Parsing
// ---------------------------------------------------------------------------

/**
 * Parse an integer option within bounds.
 * Throws VALIDATION_INVALID_OPTION naming the option on bad input.
 */
export function parseIntegerOption(
  value: string,
  name: string,
  bounds: { min: number; max: number }
): number {
  const trimmed = value.trim();
  const n = Number(trimmed);
  if (trimmed === "" || !Number.isInteger(n)) {
    throw invalidOption(name, `"${value}" is not a whole number`);
  }
  if (n < bounds.min || n > bounds.max) {
    throw invalidOption(name, `must be between ${bounds.min} and ${bounds.max}`);
  }
  return n;
}

export function parseFolderOption(value: string): string {
  if (!isFolderToken(value)) {
    throw invalidOption("--folder", `"${value}" must look like yyyy-mm (e.g. 2024-07)`);
  }
  return value;
}

export function parseUrlOption(value: string, name: string): string {
  try {
    const url = new URL(value);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw invalidOption(name, "only http and https URLs are supported");
    }
    return url.toString();
  } catch (err) {
    if (err instanceof TypeError) {
      throw invalidOption(name, `"${value}" is not a valid URL`);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws VALIDATION_CONFIG_INVALID if file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${errorMessage(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const overrides: Partial<ResolvedConfig> = {
    baseUrl: source.source?.baseUrl,
    folder: source.source?.folder,
    downloadDir: source.download?.dir,
    timeoutSeconds: source.download?.timeoutSeconds,
    maxRetries: source.download?.maxRetries,
    backoffSeconds: source.download?.backoffSeconds,
    strictSize: source.verification?.strictSize,
    verifyExisting: source.verification?.verifyExisting,
    logLevel: source.logging?.level,
    logJson: source.logging?.json,
  };
  Object.assign(target, filterUndefined(overrides));
}

/**
 * Read overrides from CNPJ_FETCH_* environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {};

  if (env.CNPJ_FETCH_BASE_URL) {
    overrides.baseUrl = parseUrlOption(env.CNPJ_FETCH_BASE_URL, "CNPJ_FETCH_BASE_URL");
  }
  if (env.CNPJ_FETCH_DOWNLOAD_DIR) {
    overrides.downloadDir = env.CNPJ_FETCH_DOWNLOAD_DIR;
  }
  if (env.CNPJ_FETCH_TIMEOUT) {
    overrides.timeoutSeconds = parseIntegerOption(
      env.CNPJ_FETCH_TIMEOUT,
      "CNPJ_FETCH_TIMEOUT",
      LIMITS.timeoutSeconds
    );
  }
  if (env.CNPJ_FETCH_RETRIES) {
    overrides.maxRetries = parseIntegerOption(
      env.CNPJ_FETCH_RETRIES,
      "CNPJ_FETCH_RETRIES",
      LIMITS.maxRetries
    );
  }

  return overrides;
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(obj) as Array<keyof T>) {
    if (obj[key] !== undefined) {
      result[key] = obj[key];
    }
  }
  return result;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > environment > user config > system config > defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envOptions: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    ...CONFIG_DEFAULTS,
    folder: undefined,
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(envOptions));
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file given on the command line; replaces the system and user files
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    if (!existsSync(explicitPath)) {
      throw invalidConfig(explicitPath, ["file not found"]);
    }
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, configFromEnv(env));

  return { config, sources };
}
