export {
  TRIGGER_NAME_RE,
  quoteIdentifier,
  triggerName,
  buildInsertTrigger,
  buildUpdateTrigger,
  buildDeleteTrigger,
  buildTriggers,
} from './trigger-sql.js';
export type { TriggerKind } from './trigger-sql.js';
export {
  getColumnNames,
  loadTrackedTables,
  getRecorderTriggers,
  installRecorder,
  uninstallRecorder,
} from './change-recorder.js';
