/**
 * Trigger-based undo/redo over a set of tracked tables.
 * Owns one UndoState and drives the recorder, interval tracker, freeze gate
 * and step engine against it.
 */

import type { UndoDb } from '../db.js';
import { installRecorder, loadTrackedTables, uninstallRecorder } from '../recorder/change-recorder.js';
import type { Interval, StepResult, TrackedTable, UndoObserver, UndoOptions, UndoStatus } from '../types/undo.js';
import type { UndoLogTable } from '../schema/undo-log.js';
import type { UndoState } from './undo-state.js';
import { createUndoState, resetUndoState } from './undo-state.js';
import { barrier, startInterval } from './interval-tracker.js';
import { freeze, isFrozen, unfreeze } from './freeze-gate.js';
import { step } from './step-engine.js';

export class UndoManager {
  private db: UndoDb;
  private state: UndoState;
  private observer: UndoObserver | undefined;

  constructor(db: UndoDb, options: UndoOptions = {}) {
    this.db = db;
    this.state = createUndoState(options);
    this.observer = options.observer;
  }

  get isActive(): boolean { return this.state.active; }
  get isFrozen(): boolean { return isFrozen(this.state); }
  get freezeEnabled(): boolean { return this.state.freezeEnabled; }
  get canUndo(): boolean { return this.state.active && this.state.undoStack.length > 0; }
  get canRedo(): boolean { return this.state.active && this.state.redoStack.length > 0; }
  get undoCount(): number { return this.state.undoStack.length; }
  get redoCount(): number { return this.state.redoStack.length; }
  get undoHistory(): readonly Interval[] { return [...this.state.undoStack]; }
  get redoHistory(): readonly Interval[] { return [...this.state.redoStack]; }
  get trackedTables(): readonly TrackedTable[] { return this.state.tables; }
  get firstLog(): number { return this.state.firstLog; }
  get freezeWatermark(): number | null { return this.state.freezeWatermark; }
  get log(): UndoLogTable { return this.state.log; }

  status(): UndoStatus {
    return {
      active: this.state.active,
      frozen: this.isFrozen,
      canUndo: this.canUndo,
      canRedo: this.canRedo,
      undoCount: this.undoCount,
      redoCount: this.redoCount,
    };
  }

  /**
   * Start recording changes to the given tables. Does nothing if already
   * active. If the recorder cannot be installed, whatever was installed is
   * removed again and the error is rethrown.
   */
  activate(...tableNames: string[]): void {
    if (this.state.active) return;

    const tables = loadTrackedTables(this.db, tableNames);
    try {
      installRecorder(this.db, this.state.log, tables);
    } catch (err: unknown) {
      uninstallRecorder(this.db, this.state.log, tables);
      throw err;
    }
    this.state.tables = tables;

    resetUndoState(this.state);
    this.state.active = true;
    startInterval(this.db, this.state);
    this.notify();
  }

  /** Stop recording, drop the triggers and the log, forget all history */
  deactivate(): void {
    if (!this.state.active) return;

    uninstallRecorder(this.db, this.state.log, this.state.tables);
    resetUndoState(this.state);
    this.state.tables = [];
    this.state.active = false;
    this.notify();
  }

  /** Close the changes made since the last barrier into one undo step */
  barrier(): Interval | null {
    if (!this.state.active) return null;

    const interval = barrier(this.db, this.state);
    this.notify();
    return interval;
  }

  /** Stop accepting changes into the undo history until unfreeze() */
  freeze(): void {
    if (!this.state.active) return;
    freeze(this.db, this.state);
    if (this.isFrozen) this.notify();
  }

  /** Discard the changes logged since freeze(). Returns the number of log rows discarded. */
  unfreeze(): number {
    if (!this.state.active || !this.state.freezeEnabled) return 0;
    const discarded = unfreeze(this.db, this.state);
    this.notify();
    return discarded;
  }

  /** Undo the most recent step. Returns null if there is nothing to undo. */
  undo(): StepResult | null {
    return this.step('undo');
  }

  /** Redo the most recently undone step. Returns null if there is nothing to redo. */
  redo(): StepResult | null {
    return this.step('redo');
  }

  private step(direction: 'undo' | 'redo'): StepResult | null {
    if (!this.state.active) return null;

    const result = step(this.db, this.state, direction);
    if (result) {
      this.observer?.onReload?.();
      this.notify();
    }
    return result;
  }

  private notify(): void {
    this.observer?.onStatusChange?.(this.status());
  }
}
