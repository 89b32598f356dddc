/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import type { ShellResult } from './shell.js';

/** Render a cell the way the sqlite3 shell does */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Uint8Array) return `X'${Buffer.from(value).toString('hex').toUpperCase()}'`;
  return String(value);
}

// --- Result output ---

export function printResult(result: ShellResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'info': info(result.message); break;
    case 'error': error(result.message); break;
    case 'rows': printRows(result.columns, result.rows); break;
    case 'quit': break;
  }
}

export function printRows(columns: readonly string[], rows: readonly (readonly unknown[])[]): void {
  console.log(chalk.bold(columns.join('|')));
  for (const row of rows) {
    console.log(row.map(formatCell).join('|'));
  }
  console.log(chalk.dim(`(${rows.length} ${rows.length === 1 ? 'row' : 'rows'})`));
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function dim(message: string): void {
  console.log(chalk.dim(message));
}
