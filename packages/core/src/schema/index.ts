export { DEFAULT_LOG_TABLE, createUndoLogTable, undoLog } from './undo-log.js';
export type { UndoLogTable } from './undo-log.js';
