/**
 * CLI output utilities
 * Status lines, the run spinner and summary formatting
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/** The single active spinner; ora writes it to stderr and stays quiet without a TTY */
let spinner: Ora | null = null;

let verbose = false;

/**
 * Toggle `[DEBUG]` lines for the rest of the process
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/**
 * Start the spinner, replacing any spinner already running
 *
 * @param message - Initial text
 */
export function startSpinner(message: string): Ora {
  spinner?.stop();
  spinner = ora({ text: message, spinner: 'dots' }).start();
  return spinner;
}

export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

function finishSpinner(finish: (active: Ora) => void): void {
  if (!spinner) return;
  finish(spinner);
  spinner = null;
}

export function succeedSpinner(message?: string): void {
  finishSpinner((active) => active.succeed(message));
}

export function failSpinner(message?: string): void {
  finishSpinner((active) => active.fail(message));
}

/**
 * Clear the spinner without a status symbol (used before printing fatal errors)
 */
export function stopSpinner(): void {
  finishSpinner((active) => active.stop());
}

/**
 * Print a header framed by blank lines
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a debug message (verbose mode only)
 */
export function printDebug(message: string): void {
  if (verbose) {
    console.log(theme.dim(`[DEBUG] ${message}`));
  }
}

export function printKeyValue(key: string, value: string | number): void {
  console.log(`  ${theme.secondary(`${key}:`)} ${value}`);
}

/**
 * Print a dashed list item
 *
 * @param indent - Nesting level, two spaces each
 */
export function printListItem(item: string, indent: number = 0): void {
  console.log(theme.secondary(`${'  '.repeat(indent)}- `) + item);
}

/**
 * Print left-aligned columns under an underlined header row
 */
export function printTable(headers: readonly string[], rows: readonly (readonly string[])[]): void {
  const widths = headers.map((header, column) =>
    rows.reduce((width, row) => Math.max(width, (row[column] ?? '').length), header.length)
  );
  const formatRow = (cells: readonly string[]) =>
    cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join('  ').trimEnd();

  const headerLine = formatRow(headers);
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));
  for (const row of rows) {
    console.log(formatRow(row));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Format a millisecond duration for summaries
 *
 * @returns e.g. `850ms`, `4.2s`, `2m 05s`
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
}
