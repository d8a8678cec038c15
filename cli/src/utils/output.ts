/**
 * Output formatting utilities
 * Handles table and JSON output with colors
 */

import chalk from 'chalk';
import Table from 'cli-table3';

export interface OutputOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Print output as-is, or as JSON
 */
export function output(data: unknown, options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
  } else if (!options.quiet) {
    console.log(data);
  }
}

/**
 * Print success message
 */
export function success(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify({ success: true, message }));
  } else if (!options.quiet) {
    console.log(chalk.green('✓'), message);
  }
}

/**
 * Print error message
 */
export function error(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.error(JSON.stringify({ success: false, error: message }));
  } else {
    console.error(chalk.red('✗'), message);
  }
}

/**
 * Print warning message
 */
export function warning(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.warn(JSON.stringify({ warning: message }));
  } else if (!options.quiet) {
    console.warn(chalk.yellow('⚠'), message);
  }
}

/**
 * Print info message
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify({ info: message }));
  } else if (!options.quiet) {
    console.log(chalk.blue('ℹ'), message);
  }
}

/**
 * Create a table with headers and rows
 */
export function createTable(headers: string[], rows: string[][]): Table.Table {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: {
      head: [],
      border: ['grey'],
    },
  });

  rows.forEach((row) => table.push(row));
  return table;
}

/**
 * Format a byte count for display
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Color a processed/submitted ratio: green when everything came back
 */
export function colorProcessed(processed: number, submitted: number): string {
  const text = `${processed}/${submitted}`;
  if (processed === submitted) return chalk.green(text);
  if (processed === 0) return chalk.red(text);
  return chalk.yellow(text);
}

/**
 * Format a list as bullet points
 */
export function formatList(items: string[]): string {
  return items.map((item) => `  • ${item}`).join('\n');
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(data: Record<string, string | number>): string {
  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));
  return Object.entries(data)
    .map(([key, value]) => {
      const paddedKey = key.padEnd(maxKeyLength);
      return `  ${chalk.cyan(paddedKey)}: ${value}`;
    })
    .join('\n');
}
