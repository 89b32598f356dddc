export type {
  Interval,
  TrackedTable,
  StepDirection,
  StepResult,
  UndoStatus,
  UndoObserver,
  UndoOptions,
} from './undo.js';
