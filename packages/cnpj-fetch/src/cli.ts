import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerFetchCommand } from "./modules/fetch.js";
import { registerListCommand } from "./modules/list.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import type { CommandDeps } from "./modules/runtime.js";

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export function createProgram(deps: CommandDeps = {}): Command {
  const program = new Command()
    .name("cnpj-fetch")
    .description("Download the latest CNPJ open data release from the Receita Federal portal")
    .version(readVersion())
    .option("--json", "Output NDJSON events and JSON results")
    .option("-q, --quiet", "Only print the final summary and errors")
    .option("--verbose", "Enable debug logging");

  registerFetchCommand(program, deps);
  registerListCommand(program, deps);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv, deps: CommandDeps = {}): Promise<void> {
  initContext(argv, deps.env);
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}
