/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat, TableSummary } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a table summary as aligned columns
 */
export function printTable(summary: TableSummary, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  console.log(chalk.bold(`\n${summary.source}`));
  console.log(chalk.gray(`${summary.rowCount} row(s), ${summary.columns.length} column(s)\n`));

  const cells = summary.rows.map((row) => summary.columns.map((column) => formatCell(row[column])));
  const widths = summary.columns.map((column, index) =>
    Math.max(column.length, ...cells.map((row) => row[index].length))
  );

  console.log(chalk.bold(summary.columns.map((column, i) => column.padEnd(widths[i])).join('  ')));
  for (const row of cells) {
    console.log(row.map((cell, i) => cell.padEnd(widths[i])).join('  '));
  }

  if (summary.rows.length < summary.rowCount) {
    console.log(chalk.gray(`... ${summary.rowCount - summary.rows.length} more row(s)`));
  }
}

/**
 * Print a key/value listing
 */
export function printStatus(status: object, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  for (const [key, value] of Object.entries(status)) {
    const label = formatLabel(key);
    console.log(`  ${chalk.gray(label + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function formatCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(String).join(' ');
  return String(value);
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 50 ? value.slice(0, 50) + '...' : value;
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? chalk.gray('(none)') : value.map(String).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatLabel(key: string): string {
  // Convert camelCase to Title Case with spaces
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
