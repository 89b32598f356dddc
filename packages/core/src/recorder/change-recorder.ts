/**
 * Installs and removes the change log and the recording triggers.
 * The only part of the engine that touches the tracked tables' shape.
 */

import { getTableName, sql } from 'drizzle-orm';
import type { UndoDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { UndoLogTable } from '../schema/undo-log.js';
import type { TrackedTable } from '../types/undo.js';
import { UndoResourceError } from '../errors.js';
import { TRIGGER_NAME_RE, buildTriggers, quoteIdentifier, triggerName } from './trigger-sql.js';
import type { TriggerKind } from './trigger-sql.js';

const TRIGGER_KINDS: readonly TriggerKind[] = ['i', 'u', 'd'];

/** Ordered column names of a table, empty if the table does not exist */
export function getColumnNames(db: UndoDb, table: string): string[] {
  const rows = db.all<{ name: string }>(sql`SELECT name FROM pragma_table_info(${table}) ORDER BY cid`);
  return rows.map(r => r.name);
}

/** Resolve table names into tracked tables, failing on any unknown table */
export function loadTrackedTables(db: UndoDb, names: readonly string[]): TrackedTable[] {
  return names.map(name => {
    const columns = getColumnNames(db, name);
    if (columns.length === 0) {
      throw new UndoResourceError(`Cannot track ${name}: no such table`);
    }
    return { name, columns };
  });
}

/** Names of the recording triggers currently installed on the connection */
export function getRecorderTriggers(db: UndoDb): string[] {
  const rows = db.all<{ name: string }>(
    sql`SELECT name FROM sqlite_temp_master WHERE type = 'trigger' ORDER BY rowid`,
  );
  return rows.map(r => r.name).filter(name => TRIGGER_NAME_RE.test(name));
}

/**
 * Drop any previous log table, create a fresh one and install the three
 * recording triggers on every table.
 */
export function installRecorder(db: UndoDb, log: UndoLogTable, tables: readonly TrackedTable[]): void {
  const raw = getRawDb(db);
  const logName = getTableName(log);

  try {
    raw.exec(`DROP TABLE IF EXISTS temp.${quoteIdentifier(logName)}`);
    raw.exec(`CREATE TEMP TABLE ${quoteIdentifier(logName)}(seq INTEGER PRIMARY KEY, sql TEXT NOT NULL)`);
  } catch (err: unknown) {
    throw new UndoResourceError(`Cannot create log table ${logName}`, err);
  }

  for (const table of tables) {
    try {
      for (const kind of TRIGGER_KINDS) {
        raw.exec(`DROP TRIGGER IF EXISTS temp.${quoteIdentifier(triggerName(table.name, kind))}`);
      }
      for (const statement of buildTriggers(table, logName)) {
        raw.exec(statement);
      }
    } catch (err: unknown) {
      throw new UndoResourceError(`Cannot install triggers on ${table.name}`, err);
    }
  }
}

/**
 * Drop the recording triggers of the given tables and the log table. Triggers
 * on other tables belong to other sessions and stay. Safe to call when
 * nothing is installed.
 */
export function uninstallRecorder(db: UndoDb, log: UndoLogTable, tables: readonly TrackedTable[]): void {
  const raw = getRawDb(db);
  const logName = getTableName(log);

  try {
    for (const table of tables) {
      for (const kind of TRIGGER_KINDS) {
        raw.exec(`DROP TRIGGER IF EXISTS temp.${quoteIdentifier(triggerName(table.name, kind))}`);
      }
    }
    raw.exec(`DROP TABLE IF EXISTS temp.${quoteIdentifier(logName)}`);
  } catch (err: unknown) {
    throw new UndoResourceError('Cannot remove change recorder', err);
  }
}
