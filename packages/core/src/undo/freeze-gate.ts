/**
 * Freeze/unfreeze: a window during which logged changes are thrown away
 * instead of becoming undoable. The triggers stay installed throughout.
 */

import type { UndoDb } from '../db.js';
import { deleteLogAfter, getMaxSequence } from '../queries/log-queries.js';
import { UndoStateError } from '../errors.js';
import type { UndoState } from './undo-state.js';

export function isFrozen(state: UndoState): boolean {
  return state.freezeWatermark !== null;
}

/** Remember the current log max. Freezing twice is an error. */
export function freeze(db: UndoDb, state: UndoState): void {
  if (!state.freezeEnabled) return;
  if (state.freezeWatermark !== null) {
    throw new UndoStateError('Recursive call to freeze');
  }
  state.freezeWatermark = getMaxSequence(db, state.log);
}

/**
 * Discard every log row written since freeze(). Returns the number of rows
 * discarded.
 */
export function unfreeze(db: UndoDb, state: UndoState): number {
  if (!state.freezeEnabled) return 0;
  const watermark = state.freezeWatermark;
  if (watermark === null) {
    throw new UndoStateError('Called unfreeze while not frozen');
  }

  const discarded = deleteLogAfter(db, state.log, watermark);
  state.freezeWatermark = null;
  // Sequence numbers above the watermark will be handed out again
  if (state.firstLog > watermark + 1) {
    state.firstLog = watermark + 1;
  }
  return discarded;
}
