import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { errorMessage } from "../lib/errors/catalog.js";
import { isFetchError } from "../lib/errors/types.js";
import { maybeOutputJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# cnpj-fetch configuration
# Place at ~/.config/cnpj-fetch/config.yaml (user) or /etc/cnpj-fetch/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Environment (CNPJ_FETCH_BASE_URL, CNPJ_FETCH_DOWNLOAD_DIR,
#    CNPJ_FETCH_TIMEOUT, CNPJ_FETCH_RETRIES)
# 3. User config (~/.config/cnpj-fetch/config.yaml)
# 4. System config (/etc/cnpj-fetch/config.yaml)
# 5. Built-in defaults

# Where releases are published
source:
  baseUrl: "https://arquivos.receitafederal.gov.br/dados/cnpj/dados_abertos_cnpj/"

  # Pin a release instead of taking the newest one
  # folder: "2024-07"

# Transfer settings
download:
  # Destination directory (can be overridden with --download-dir)
  dir: "./Downloads_CNPJ"

  # Connect timeout and longest allowed gap between body chunks (1-3600)
  timeoutSeconds: 300

  # Attempts per file (1-20)
  maxRetries: 3

  # Attempt n waits n * backoffSeconds before starting (0-600)
  backoffSeconds: 10

# Size checks against Content-Length
verification:
  # Retry a file whose size differs instead of only warning
  strictSize: false

  # Ask the server for the size of files already on disk
  verifyExisting: false

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs
  json: false
`;

function describeError(error: unknown): string {
  if (isFetchError(error) && error.details) {
    return `${error.message}\n${error.details}`;
  }
  return errorMessage(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage cnpj-fetch configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Use a text editor to modify it, or delete it first."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${errorMessage(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${describeError(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'cnpj-fetch config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        if (maybeOutputJson({ effective: resolved, sources })) return;

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("Source:"));
        console.log(`  baseUrl:        ${resolved.baseUrl}`);
        console.log(`  folder:         ${resolved.folder ?? "(latest)"}`);

        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  dir:            ${resolved.downloadDir}`);
        console.log(`  timeoutSeconds: ${resolved.timeoutSeconds}`);
        console.log(`  maxRetries:     ${resolved.maxRetries}`);
        console.log(`  backoffSeconds: ${resolved.backoffSeconds}`);

        console.log();
        console.log(chalk.bold("Verification:"));
        console.log(`  strictSize:     ${resolved.strictSize}`);
        console.log(`  verifyExisting: ${resolved.verifyExisting}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${describeError(error)}`));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
