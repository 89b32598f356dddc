/**
 * Error taxonomy of the undo engine.
 * No-op conditions (nothing to undo, freeze disabled, empty barrier) never throw.
 */

import type { Interval, StepDirection } from './types/undo.js';

export class UndoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UndoError';
  }
}

/** Precondition violation: recursive freeze, unfreeze while not frozen, popping an empty stack */
export class UndoStateError extends UndoError {
  constructor(message: string) {
    super(message);
    this.name = 'UndoStateError';
  }
}

/** The log table or the triggers could not be created or dropped */
export class UndoResourceError extends UndoError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UndoResourceError';
  }
}

/** An inverse statement failed during replay. The step was rolled back. */
export class UndoStepError extends UndoError {
  readonly direction: StepDirection;
  readonly interval: Interval;
  readonly statement: string | null;

  constructor(direction: StepDirection, interval: Interval, statement: string | null, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${direction} of [${interval.begin}, ${interval.end}] failed: ${reason}`, { cause });
    this.name = 'UndoStepError';
    this.direction = direction;
    this.interval = interval;
    this.statement = statement;
  }
}
