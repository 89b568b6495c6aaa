// ABOUTME: Shared terminal output helpers for the CLI: chalk log functions, spinners, exit codes.
// ABOUTME: Also formats site tables and maps core errors to exit codes and printable lines.

import chalk from "chalk";
import ora, { type Ora } from "ora";
import {
  ConflictError,
  ExternalToolError,
  NotFoundError,
  ValidationError,
  error as logError,
  getErrorMessage,
  type DiscoveredSite
} from "@nginx-sites/core";

/**
 * Exit codes for consistent error handling
 */
export const ExitCodes = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  NOT_FOUND: 3,
  PERMISSION_DENIED: 4,
  CONFLICT: 5,
  EXTERNAL_TOOL: 6
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

// Log functions using chalk
export const log = {
  info: (message: string) => console.log(chalk.blue(`[INFO] `) + message),
  success: (message: string) =>
    console.log(chalk.green(`[SUCCESS] `) + message),
  warning: (message: string) =>
    console.log(chalk.yellow(`[WARNING] `) + message),
  error: (message: string) => console.log(chalk.red(`[ERROR] `) + message),
  step: (message: string) => console.log(`\n${chalk.cyan("==> ")}${message}`)
};

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ValidationError) return ExitCodes.INVALID_ARGUMENT;
  if (error instanceof NotFoundError) return ExitCodes.NOT_FOUND;
  if (error instanceof ConflictError) return ExitCodes.CONFLICT;
  if (error instanceof ExternalToolError) return ExitCodes.EXTERNAL_TOOL;
  return ExitCodes.GENERAL_ERROR;
}

/**
 * The lines shown to the operator for a failed operation: the message, and
 * for a failed nginx/certbot run the tool's own output, dimmed.
 */
export function describeError(error: unknown): string[] {
  const lines = [chalk.red(`❌ ${getErrorMessage(error)}`)];
  if (error instanceof ExternalToolError && error.output.trim() !== "") {
    lines.push(chalk.dim(error.output.trim()));
  }
  return lines;
}

/**
 * Print an error without exiting. Used at the menu boundary.
 */
export function reportError(error: unknown): void {
  for (const line of describeError(error)) {
    console.error(line);
  }
}

/**
 * Consistent error formatting and logging for one-shot subcommands
 */
export function handleCommandError(error: unknown, context: string): never {
  logError(`${context}: ${getErrorMessage(error)}`);
  reportError(error);
  process.exit(exitCodeFor(error));
}

/**
 * Create a spinner with consistent styling
 */
export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: "blue",
    spinner: "dots"
  });
}

export function showSuccess(message: string): void {
  console.log(chalk.green(`✅ ${message}`));
}

export function showWarning(message: string): void {
  console.log(chalk.yellow(`⚠️  ${message}`));
}

export function showInfo(message: string): void {
  console.log(chalk.blue(`ℹ️  ${message}`));
}

/**
 * Display error message with consistent formatting (without exiting)
 */
export function showError(message: string): void {
  console.log(chalk.red(`❌ ${message}`));
}

function pad(value: string, width: number): string {
  return value + " ".repeat(Math.max(0, width - value.length));
}

/**
 * Plain-text table of discovered sites, one row per config. Colour is left
 * to the caller so the rows can be asserted on directly.
 */
export function formatSiteTable(sites: DiscoveredSite[]): string[] {
  const header = ["DOMAIN", "STATUS", "PORT", "MODE", "SSL"];
  const rows = sites.map((site) => [
    site.domain,
    site.enabled ? "enabled" : "disabled",
    site.port === null ? "?" : String(site.port),
    site.mode,
    site.sslEnabled ? "yes" : "no"
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column].length))
  );

  return [header, ...rows].map((row) =>
    row
      .map((cell, column) => (column === row.length - 1 ? cell : pad(cell, widths[column])))
      .join("  ")
  );
}

export function printSiteTable(sites: DiscoveredSite[]): void {
  if (sites.length === 0) {
    showInfo("No site configurations found");
    return;
  }
  const [header, ...rows] = formatSiteTable(sites);
  console.log(chalk.bold(header));
  for (const row of rows) {
    console.log(row);
  }
}
