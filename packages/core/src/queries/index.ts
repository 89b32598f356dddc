export {
  getMaxSequence,
  getInverseStatements,
  deleteLogRange,
  deleteLogAfter,
  getLogEntries,
  countLogEntries,
} from './log-queries.js';
export type { LogEntry } from './log-queries.js';
