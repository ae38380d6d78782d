import { Command } from "commander";
import chalk from "chalk";
import {
  LIMITS,
  loadConfig,
  parseFolderOption,
  parseIntegerOption,
  parseUrlOption,
  type ResolvedConfig,
} from "../lib/config.js";
import { createFolderResolver, normalizeBaseUrl } from "../lib/folder-resolver.js";
import { listFolderFiles } from "../lib/fetch-orchestrator.js";
import {
  maybeOutputJson,
  type ListFilesJson,
  type ListFoldersJson,
} from "../lib/json-output.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { createRuntime, type CommandDeps } from "./runtime.js";

export interface ListOptions {
  baseUrl?: string;
  folder?: string;
  files?: boolean;
  timeout?: string;
  config?: string;
}

export function listOverrides(options: ListOptions): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {};
  if (options.baseUrl !== undefined) {
    overrides.baseUrl = parseUrlOption(options.baseUrl, "--base-url");
  }
  if (options.folder !== undefined) {
    overrides.folder = parseFolderOption(options.folder);
  }
  if (options.timeout !== undefined) {
    overrides.timeoutSeconds = parseIntegerOption(options.timeout, "--timeout", LIMITS.timeoutSeconds);
  }
  return overrides;
}

/**
 * Print release folders (newest first) or, with `files`, the archives of
 * the latest or pinned folder. Returns the exit code.
 */
export async function runList(options: ListOptions, deps: CommandDeps = {}): Promise<number> {
  try {
    const { config } = loadConfig(options.config, listOverrides(options), deps.env);
    const { logger, listing } = createRuntime(config, deps);
    const timeoutMs = config.timeoutSeconds * 1000;
    const resolver = createFolderResolver({ listing, timeoutMs, logger });

    if (!options.files) {
      const folders = await resolver.listFolders(config.baseUrl);
      const data: ListFoldersJson = {
        baseUrl: normalizeBaseUrl(config.baseUrl),
        latest: folders[0],
        folders,
      };
      if (!maybeOutputJson(data)) {
        for (const [index, folder] of folders.entries()) {
          console.log(index === 0 ? `${folder} ${chalk.green("(latest)")}` : folder);
        }
      }
      return 0;
    }

    const folder = await resolver.resolve(config.baseUrl, config.folder);
    const files = await listFolderFiles(folder.url, { listing, timeoutMs, logger });
    const data: ListFilesJson = { folder: folder.name, folderUrl: folder.url, files };
    if (!maybeOutputJson(data)) {
      console.log(chalk.cyan(`${folder.name} ${chalk.gray(folder.url)}`));
      for (const file of files) {
        console.log(`  ${file.name}`);
      }
    }
    return 0;
  } catch (error) {
    renderUnknownError(error);
    return 1;
  }
}

export function registerListCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command("list")
    .description("Show the release folders on the portal")
    .option("--files", "List the files of the latest (or --folder) release instead")
    .option("--folder <yyyy-mm>", "Release folder to list with --files")
    .option("--base-url <url>", "Portal root listing the yyyy-mm release folders")
    .option("--timeout <seconds>", "Request timeout (default: 300)")
    .option("-c, --config <path>", "Path to configuration file")
    .action(async (options: ListOptions) => {
      process.exitCode = await runList(options, deps);
    });
}
