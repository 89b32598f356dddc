export { UndoManager } from './undo-manager.js';
export {
  createUndoState,
  resetUndoState,
  pushInterval,
  popInterval,
  stacksFor,
  DEFAULT_UNDO_OPTIONS,
} from './undo-state.js';
export type { UndoState } from './undo-state.js';
export { startInterval, barrier } from './interval-tracker.js';
export { freeze, unfreeze, isFrozen } from './freeze-gate.js';
export { step, undo, redo } from './step-engine.js';
