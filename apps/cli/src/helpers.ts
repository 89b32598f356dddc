/**
 * CLI helpers: option resolution, formatting, error handling.
 */

import type { Interval, UndoObserver, UndoOptions, UndoStatus } from '@sqlite-undo/core';
import { DEFAULT_LOG_TABLE } from '@sqlite-undo/core';
import * as out from './output.js';

/** Options as parsed by commander */
export interface CliOptions {
  track: string[];
  logTable?: string;
  freeze: boolean;
  manualBarrier?: boolean;
  verbose?: boolean;
}

export interface ShellConfig {
  tables: string[];
  autoBarrier: boolean;
  undoOptions: UndoOptions;
}

/** Turn parsed CLI options into shell and undo configuration */
export function resolveConfig(opts: CliOptions, observer?: UndoObserver): ShellConfig {
  return {
    tables: opts.track,
    autoBarrier: !opts.manualBarrier,
    undoOptions: {
      logTable: opts.logTable ?? DEFAULT_LOG_TABLE,
      freeze: opts.freeze,
      observer: opts.verbose ? observer : undefined,
    },
  };
}

export function formatInterval(interval: Interval): string {
  return `[${interval.begin}, ${interval.end}]`;
}

export function formatStack(intervals: readonly Interval[]): string {
  if (intervals.length === 0) return '(empty)';
  return intervals.map(formatInterval).join(' ');
}

export function formatStatus(status: UndoStatus): string {
  const yesNo = (b: boolean) => (b ? 'yes' : 'no');
  return `active: ${yesNo(status.active)}, frozen: ${yesNo(status.frozen)}, undo: ${status.undoCount}, redo: ${status.redoCount}`;
}

/**
 * Run an action, printing any error instead of throwing.
 * Returns false if the action failed.
 */
export function $try(fn: () => void): boolean {
  try {
    fn();
    return true;
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    return false;
  }
}
