/** Closed range of log sequence numbers making up one undo or redo step */
export interface Interval {
  readonly begin: number;
  readonly end: number;
}

/** A table whose row changes are recorded. Columns are read once, at activation. */
export interface TrackedTable {
  readonly name: string;
  readonly columns: readonly string[];
}

export type StepDirection = 'undo' | 'redo';

export interface StepResult {
  readonly direction: StepDirection;
  /** Interval popped from the source stack */
  readonly replayed: Interval;
  /** Interval pushed on the opposite stack, null when replay logged nothing */
  readonly recorded: Interval | null;
  /** Number of inverse statements executed */
  readonly statements: number;
}

export interface UndoStatus {
  readonly active: boolean;
  readonly frozen: boolean;
  readonly canUndo: boolean;
  readonly canRedo: boolean;
  readonly undoCount: number;
  readonly redoCount: number;
}

/**
 * Host application callbacks, e.g. to gray out menu entries or redraw views.
 */
export interface UndoObserver {
  /** Called after activate, deactivate, barrier, freeze, unfreeze, undo and redo */
  onStatusChange?(status: UndoStatus): void;
  /** Called after every committed undo or redo step */
  onReload?(): void;
}

export interface UndoOptions {
  /** Name of the temporary log table */
  logTable?: string;
  /** Set to false to turn freeze/unfreeze into no-ops */
  freeze?: boolean;
  observer?: UndoObserver;
}
