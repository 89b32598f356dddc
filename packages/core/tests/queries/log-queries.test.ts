import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, getRawDb, type UndoDb } from '../../src/db.js';
import { installRecorder, loadTrackedTables } from '../../src/recorder/change-recorder.js';
import { undoLog } from '../../src/schema/undo-log.js';
import {
  countLogEntries,
  deleteLogAfter,
  deleteLogRange,
  getInverseStatements,
  getLogEntries,
  getMaxSequence,
} from '../../src/queries/log-queries.js';

let db: UndoDb;

beforeEach(() => {
  db = createTestDb('CREATE TABLE tbl1(a);');
  installRecorder(db, undoLog, loadTrackedTables(db, ['tbl1']));
});

function insert(...values: number[]): void {
  const stmt = getRawDb(db).prepare('INSERT INTO tbl1 VALUES(?)');
  for (const value of values) stmt.run(value);
}

describe('getMaxSequence', () => {
  it('is 0 for an empty log', () => {
    expect(getMaxSequence(db, undoLog)).toBe(0);
  });

  it('returns the highest sequence number', () => {
    insert(23, 42, 69);
    expect(getMaxSequence(db, undoLog)).toBe(3);
  });
});

describe('getInverseStatements', () => {
  it('returns the rows of an interval, latest first', () => {
    insert(23, 42, 69);
    expect(getInverseStatements(db, undoLog, { begin: 1, end: 2 })).toEqual([
      'DELETE FROM "tbl1" WHERE rowid=2',
      'DELETE FROM "tbl1" WHERE rowid=1',
    ]);
  });
});

describe('deleteLogRange', () => {
  it('removes only the rows of the interval', () => {
    insert(23, 42, 69);
    expect(deleteLogRange(db, undoLog, { begin: 2, end: 3 })).toBe(2);
    expect(getLogEntries(db, undoLog)).toEqual([{ seq: 1, sql: 'DELETE FROM "tbl1" WHERE rowid=1' }]);
  });
});

describe('deleteLogAfter', () => {
  it('removes every row above the sequence number', () => {
    insert(23, 42, 69);
    expect(deleteLogAfter(db, undoLog, 1)).toBe(2);
    expect(countLogEntries(db, undoLog)).toBe(1);
  });

  it('removes nothing when no row is above it', () => {
    insert(23);
    expect(deleteLogAfter(db, undoLog, 1)).toBe(0);
  });
});
