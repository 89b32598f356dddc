// Types
export type {
  Interval,
  TrackedTable,
  StepDirection,
  StepResult,
  UndoStatus,
  UndoObserver,
  UndoOptions,
} from './types/index.js';

// Errors
export { UndoError, UndoStateError, UndoResourceError, UndoStepError } from './errors.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getRawDb } from './db.js';
export type { UndoDb } from './db.js';

// Queries
export * from './queries/index.js';

// Recorder
export * from './recorder/index.js';

// Undo
export * from './undo/index.js';
