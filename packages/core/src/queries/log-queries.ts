/**
 * Reads and trims the change log. Rows are only ever inserted by triggers.
 */

import { asc, between, count, desc, gt, sql } from 'drizzle-orm';
import type { UndoDb } from '../db.js';
import type { UndoLogTable } from '../schema/undo-log.js';
import type { Interval } from '../types/undo.js';

export interface LogEntry {
  readonly seq: number;
  readonly sql: string;
}

/** Highest sequence number in the log, 0 when empty */
export function getMaxSequence(db: UndoDb, log: UndoLogTable): number {
  const row = db.select({ value: sql<number>`coalesce(max(${log.seq}), 0)` }).from(log).get();
  return row?.value ?? 0;
}

/** Inverse statements of an interval, latest change first */
export function getInverseStatements(db: UndoDb, log: UndoLogTable, interval: Interval): string[] {
  const rows = db.select({ sql: log.sql })
    .from(log)
    .where(between(log.seq, interval.begin, interval.end))
    .orderBy(desc(log.seq))
    .all();
  return rows.map(r => r.sql);
}

/** Delete the log rows of an interval. Returns the number of rows removed. */
export function deleteLogRange(db: UndoDb, log: UndoLogTable, interval: Interval): number {
  return db.delete(log).where(between(log.seq, interval.begin, interval.end)).run().changes;
}

/** Delete every log row recorded after a sequence number */
export function deleteLogAfter(db: UndoDb, log: UndoLogTable, seq: number): number {
  return db.delete(log).where(gt(log.seq, seq)).run().changes;
}

export function getLogEntries(db: UndoDb, log: UndoLogTable): LogEntry[] {
  return db.select({ seq: log.seq, sql: log.sql }).from(log).orderBy(asc(log.seq)).all();
}

export function countLogEntries(db: UndoDb, log: UndoLogTable): number {
  const row = db.select({ cnt: count() }).from(log).get();
  return row?.cnt ?? 0;
}
