/**
 * The state of one undo session. Every engine function takes it explicitly,
 * so several sessions can coexist on different connections or table sets.
 */

import { createUndoLogTable, DEFAULT_LOG_TABLE } from '../schema/undo-log.js';
import type { UndoLogTable } from '../schema/undo-log.js';
import type { Interval, StepDirection, TrackedTable, UndoOptions } from '../types/undo.js';
import { UndoStateError } from '../errors.js';

const LOG_TABLE_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface UndoState {
  readonly log: UndoLogTable;
  readonly freezeEnabled: boolean;
  active: boolean;
  tables: TrackedTable[];
  /** Oldest step at index 0, next undo at the tail */
  undoStack: Interval[];
  /** Oldest undone step at index 0, next redo at the tail */
  redoStack: Interval[];
  /** Sequence number at which the next interval begins */
  firstLog: number;
  /** Log max at the time of freeze(), null when not frozen */
  freezeWatermark: number | null;
}

export const DEFAULT_UNDO_OPTIONS = {
  logTable: DEFAULT_LOG_TABLE,
  freeze: true,
} as const;

export function createUndoState(options: UndoOptions = {}): UndoState {
  const logTable = options.logTable ?? DEFAULT_UNDO_OPTIONS.logTable;
  if (!LOG_TABLE_RE.test(logTable)) {
    throw new UndoStateError(`Invalid log table name: ${logTable}`);
  }

  return {
    log: createUndoLogTable(logTable),
    freezeEnabled: options.freeze ?? DEFAULT_UNDO_OPTIONS.freeze,
    active: false,
    tables: [],
    undoStack: [],
    redoStack: [],
    firstLog: 1,
    freezeWatermark: null,
  };
}

/** Empty both stacks and clear the watermark */
export function resetUndoState(state: UndoState): void {
  state.undoStack = [];
  state.redoStack = [];
  state.freezeWatermark = null;
}

export function pushInterval(stack: Interval[], interval: Interval): void {
  stack.push(interval);
}

/** Pop the most recent interval. Callers check for an empty stack first. */
export function popInterval(stack: Interval[]): Interval {
  const interval = stack.pop();
  if (interval === undefined) {
    throw new UndoStateError('Cannot pop from an empty undo/redo stack');
  }
  return interval;
}

/** Source and destination stacks of a step */
export function stacksFor(state: UndoState, direction: StepDirection): [source: Interval[], destination: Interval[]] {
  return direction === 'undo'
    ? [state.undoStack, state.redoStack]
    : [state.redoStack, state.undoStack];
}
