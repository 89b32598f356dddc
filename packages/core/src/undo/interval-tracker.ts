/**
 * Turns the run of log rows written since the last barrier into one undo step.
 */

import type { UndoDb } from '../db.js';
import { getMaxSequence } from '../queries/log-queries.js';
import type { Interval } from '../types/undo.js';
import type { UndoState } from './undo-state.js';
import { pushInterval } from './undo-state.js';

/** Highest log sequence number an interval may cover. Frozen rows never qualify. */
function lastAccounted(db: UndoDb, state: UndoState): number {
  const max = getMaxSequence(db, state.log);
  if (state.freezeWatermark !== null && max > state.freezeWatermark) {
    return state.freezeWatermark;
  }
  return max;
}

/** Start the next interval one past everything accounted for so far */
export function startInterval(db: UndoDb, state: UndoState): void {
  state.firstLog = lastAccounted(db, state) + 1;
}

/**
 * Close the open interval and push it on the undo stack, clearing the redo
 * stack. Returns null, and changes nothing else, when no rows were logged.
 */
export function barrier(db: UndoDb, state: UndoState): Interval | null {
  const end = lastAccounted(db, state);
  const begin = state.firstLog;
  startInterval(db, state);
  if (begin >= state.firstLog) return null;

  const interval: Interval = { begin, end };
  pushInterval(state.undoStack, interval);
  state.redoStack = [];
  return interval;
}
