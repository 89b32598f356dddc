/**
 * Performs one undo or redo step by replaying an interval of inverse
 * statements inside a single transaction.
 *
 * Replaying fires the recording triggers again, so the replay writes its own
 * inverse into the log. That new span becomes the interval pushed on the
 * opposite stack. The replayed rows are deleted before replay starts so the
 * two spans never mix.
 */

import type { UndoDb } from '../db.js';
import { getRawDb } from '../db.js';
import { deleteLogRange, getInverseStatements, getMaxSequence } from '../queries/log-queries.js';
import type { Interval, StepDirection, StepResult } from '../types/undo.js';
import { UndoStateError, UndoStepError } from '../errors.js';
import type { UndoState } from './undo-state.js';
import { popInterval, pushInterval, stacksFor } from './undo-state.js';
import { startInterval } from './interval-tracker.js';

/**
 * Undo or redo the most recent step. Returns null when there is nothing to
 * replay. On failure the transaction is rolled back, the interval goes back
 * on its stack and an UndoStepError is thrown.
 */
export function step(db: UndoDb, state: UndoState, direction: StepDirection): StepResult | null {
  if (state.freezeWatermark !== null) {
    throw new UndoStateError(`Cannot ${direction} while frozen`);
  }

  const [source, destination] = stacksFor(state, direction);
  if (source.length === 0) return null;

  const replayed = popInterval(source);
  const previousFirstLog = state.firstLog;
  const raw = getRawDb(db);
  const replay: { statement: string | null; count: number } = { statement: null, count: 0 };

  try {
    raw.transaction(() => {
      // Inverse statements run newest first; let constraints settle at commit
      raw.pragma('defer_foreign_keys = ON');

      const statements = getInverseStatements(db, state.log, replayed);
      deleteLogRange(db, state.log, replayed);
      state.firstLog = getMaxSequence(db, state.log) + 1;

      for (const statement of statements) {
        replay.statement = statement;
        raw.exec(statement);
        replay.count++;
      }
      replay.statement = null;
    })();
  } catch (err: unknown) {
    pushInterval(source, replayed);
    state.firstLog = previousFirstLog;
    throw new UndoStepError(direction, replayed, replay.statement, err);
  }

  const end = getMaxSequence(db, state.log);
  let recorded: Interval | null = null;
  if (end >= state.firstLog) {
    recorded = { begin: state.firstLog, end };
    pushInterval(destination, recorded);
  }
  startInterval(db, state);

  return { direction, replayed, recorded, statements: replay.count };
}

export function undo(db: UndoDb, state: UndoState): StepResult | null {
  return step(db, state, 'undo');
}

export function redo(db: UndoDb, state: UndoState): StepResult | null {
  return step(db, state, 'redo');
}
