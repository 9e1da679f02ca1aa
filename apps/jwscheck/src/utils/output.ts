/**
 * Output formatting utilities
 */

import type { TokenLogger } from '@jwscheck/core';
import chalk from 'chalk';

export type OutputFormat = 'json' | 'table';

let outputFormat: OutputFormat = 'json';
let quietMode = false;
let verboseMode = false;

export function setOutputFormat(format: OutputFormat): void {
  outputFormat = format;
}

export function setQuietMode(quiet: boolean): void {
  quietMode = quiet;
}

export function setVerboseMode(verbose: boolean): void {
  verboseMode = verbose;
}

/**
 * Print JSON output
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printTable(headers: string[], rows: string[][]): void {
  const columnWidths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length))
  );

  console.log(headers.map((h, i) => chalk.bold(h.padEnd(columnWidths[i]))).join('  '));
  console.log(columnWidths.map((w) => '-'.repeat(w)).join('  '));
  for (const row of rows) {
    console.log(row.map((cell, i) => cell.padEnd(columnWidths[i])).join('  '));
  }
}

/**
 * Print data in current format
 */
export function printData<T>(
  items: T[],
  tableConfig: {
    headers: string[];
    getRow: (item: T) => string[];
  }
): void {
  if (outputFormat === 'json') {
    printJson(items);
    return;
  }
  printTable(tableConfig.headers, items.map(tableConfig.getRow));
}

// Status lines go to stderr; stdout only carries the command's data

export function success(message: string): void {
  if (!quietMode) {
    console.error(chalk.green('✓'), message);
  }
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function warn(message: string): void {
  if (!quietMode) {
    console.warn(chalk.yellow('⚠'), message);
  }
}

/**
 * Print verbose message (only if verbose mode)
 */
export function verbose(message: string): void {
  if (verboseMode) {
    console.error(chalk.gray('▸'), chalk.gray(message));
  }
}

/**
 * Decoder log sink that only shows up in verbose mode
 */
export const verboseLogger: TokenLogger = {
  debug(message, context) {
    verbose(context ? `${message} ${JSON.stringify(context)}` : message);
  },
  warn(message, context) {
    verbose(context ? `${message} ${JSON.stringify(context)}` : message);
  },
};
