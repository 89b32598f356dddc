import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, getRawDb, type UndoDb } from '../../src/db.js';
import {
  getColumnNames,
  getRecorderTriggers,
  installRecorder,
  loadTrackedTables,
  uninstallRecorder,
} from '../../src/recorder/change-recorder.js';
import { createUndoLogTable, undoLog } from '../../src/schema/undo-log.js';
import { getLogEntries } from '../../src/queries/log-queries.js';
import { UndoResourceError } from '../../src/errors.js';

const SCHEMA = `
CREATE TABLE tbl1(a);
CREATE TABLE tbl2(b);
CREATE TABLE people(id INTEGER PRIMARY KEY, name TEXT, age INTEGER);
`;

let db: UndoDb;

beforeEach(() => {
  db = createTestDb(SCHEMA);
});

function tempObjects(type: 'table' | 'trigger'): unknown[] {
  return getRawDb(db).prepare('SELECT name FROM sqlite_temp_master WHERE type = ?').pluck().all(type);
}

describe('getColumnNames', () => {
  it('returns columns in declaration order', () => {
    expect(getColumnNames(db, 'people')).toEqual(['id', 'name', 'age']);
  });

  it('returns nothing for an unknown table', () => {
    expect(getColumnNames(db, 'missing')).toEqual([]);
  });
});

describe('loadTrackedTables', () => {
  it('resolves names into tables with columns', () => {
    expect(loadTrackedTables(db, ['tbl1', 'tbl2'])).toEqual([
      { name: 'tbl1', columns: ['a'] },
      { name: 'tbl2', columns: ['b'] },
    ]);
  });

  it('fails on an unknown table', () => {
    expect(() => loadTrackedTables(db, ['tbl1', 'missing'])).toThrow(UndoResourceError);
  });
});

describe('installRecorder', () => {
  it('installs nothing but the log table when no tables are given', () => {
    installRecorder(db, undoLog, []);
    expect(getRecorderTriggers(db)).toEqual([]);
    expect(tempObjects('table')).toEqual(['undolog']);
  });

  it('installs three triggers per table', () => {
    installRecorder(db, undoLog, loadTrackedTables(db, ['tbl1']));
    expect(getRecorderTriggers(db)).toEqual(['_tbl1_it', '_tbl1_ut', '_tbl1_dt']);
  });

  it('installs triggers for several tables', () => {
    installRecorder(db, undoLog, loadTrackedTables(db, ['tbl1', 'tbl2']));
    expect(getRecorderTriggers(db)).toHaveLength(6);
  });

  it('replaces an existing log table with an empty one', () => {
    installRecorder(db, undoLog, loadTrackedTables(db, ['tbl1']));
    getRawDb(db).exec('INSERT INTO tbl1 VALUES(23)');
    expect(getLogEntries(db, undoLog)).toHaveLength(1);

    installRecorder(db, undoLog, loadTrackedTables(db, ['tbl1']));
    expect(getLogEntries(db, undoLog)).toEqual([]);
    expect(getRecorderTriggers(db)).toHaveLength(3);
  });

  it('records inverse statements as the tables change', () => {
    installRecorder(db, undoLog, loadTrackedTables(db, ['people']));
    const raw = getRawDb(db);
    raw.exec("INSERT INTO people(name, age) VALUES('Ann', 30)");
    raw.exec("UPDATE people SET name = 'Bo''s' WHERE id = 1");
    raw.exec('DELETE FROM people WHERE id = 1');

    expect(getLogEntries(db, undoLog)).toEqual([
      { seq: 1, sql: 'DELETE FROM "people" WHERE rowid=1' },
      { seq: 2, sql: `UPDATE "people" SET rowid=1,"id"=1,"name"='Ann',"age"=30 WHERE rowid=1` },
      { seq: 3, sql: `INSERT INTO "people"(rowid,"id","name","age") VALUES(1,1,'Bo''s',30)` },
    ]);
  });

  it('quotes NULL values', () => {
    installRecorder(db, undoLog, loadTrackedTables(db, ['people']));
    const raw = getRawDb(db);
    raw.exec("INSERT INTO people(name) VALUES('Ann')");
    raw.exec('DELETE FROM people');

    expect(getLogEntries(db, undoLog)[1]).toEqual({
      seq: 2,
      sql: `INSERT INTO "people"(rowid,"id","name","age") VALUES(1,1,'Ann',NULL)`,
    });
  });

  it('wraps trigger failures in a resource error', () => {
    getRawDb(db).exec('CREATE VIEW v1 AS SELECT a FROM tbl1');
    expect(() => installRecorder(db, undoLog, loadTrackedTables(db, ['v1']))).toThrow(UndoResourceError);
  });
});

describe('uninstallRecorder', () => {
  it('drops the triggers and the log table', () => {
    const tables = loadTrackedTables(db, ['tbl1', 'tbl2']);
    installRecorder(db, undoLog, tables);

    uninstallRecorder(db, undoLog, tables);

    expect(getRecorderTriggers(db)).toEqual([]);
    expect(tempObjects('table')).toEqual([]);
  });

  it('leaves unrelated temp triggers alone', () => {
    const tables = loadTrackedTables(db, ['tbl1']);
    installRecorder(db, undoLog, tables);
    getRawDb(db).exec('CREATE TEMP TRIGGER audit AFTER INSERT ON tbl2 BEGIN SELECT 1; END;');

    uninstallRecorder(db, undoLog, tables);

    expect(tempObjects('trigger')).toEqual(['audit']);
  });

  it('leaves the recording triggers of other tables alone', () => {
    const otherLog = createUndoLogTable('other_log');
    installRecorder(db, undoLog, loadTrackedTables(db, ['tbl1']));
    installRecorder(db, otherLog, loadTrackedTables(db, ['tbl2']));

    uninstallRecorder(db, undoLog, loadTrackedTables(db, ['tbl1']));

    expect(getRecorderTriggers(db)).toEqual(['_tbl2_it', '_tbl2_ut', '_tbl2_dt']);
    expect(tempObjects('table')).toEqual(['other_log']);
  });

  it('is idempotent', () => {
    const tables = loadTrackedTables(db, ['tbl1']);
    uninstallRecorder(db, undoLog, tables);
    expect(() => uninstallRecorder(db, undoLog, tables)).not.toThrow();
  });
});
