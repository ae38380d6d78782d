import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { FetchEntry, FetchSummary } from "./fetch-orchestrator.js";
import type { PlannedFile } from "./pipeline.js";

const UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Binary-prefixed size: "512 B", "1.5 KB", "2.0 GB".
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * "850ms", "12.3s", "4m 05s".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.floor(seconds % 60);
  return `${minutes}m ${String(rest).padStart(2, "0")}s`;
}

function formatStatus(entry: FetchEntry): string {
  switch (entry.status) {
    case "succeeded":
      return entry.verified === false ? chalk.yellow("downloaded (size differs)") : chalk.green("downloaded");
    case "skipped":
      return chalk.gray("skipped");
    case "failed":
      return chalk.red("failed");
  }
}

/**
 * Final manifest: one row per file plus a totals line.
 */
export function renderManifest(summary: FetchSummary): string {
  const table = new CliTable3({
    head: [chalk.cyan("File"), chalk.cyan("Status"), chalk.cyan("Size"), chalk.cyan("Attempts")],
  });

  for (const entry of summary.entries) {
    table.push([
      entry.name,
      formatStatus(entry),
      entry.status === "failed" ? "-" : formatBytes(entry.bytes),
      entry.attempts === 0 ? "-" : String(entry.attempts),
    ]);
  }

  const { counts } = summary;
  const totals =
    `${chalk.bold("Total:")} ${formatBytes(summary.totalBytes)} in ${summary.destinationDir} ` +
    `(${counts.succeeded} downloaded, ${counts.skipped} skipped, ${counts.failed} failed, ` +
    `${formatDuration(summary.durationMs)})`;

  return `${table.toString()}\n${totals}`;
}

/**
 * Dry-run listing of what a fetch would do.
 */
export function renderPlan(plan: PlannedFile[]): string {
  const table = new CliTable3({
    head: [chalk.cyan("File"), chalk.cyan("Action"), chalk.cyan("Local size")],
  });

  for (const file of plan) {
    table.push([
      file.name,
      file.action === "skip" ? chalk.gray("skip") : chalk.green("download"),
      file.localBytes === null ? "-" : formatBytes(file.localBytes),
    ]);
  }

  const downloads = plan.filter((f) => f.action === "download").length;
  return `${table.toString()}\n${chalk.bold("Planned:")} ${downloads} to download, ${plan.length - downloads} already present`;
}
