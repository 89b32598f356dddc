import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const DEFAULT_LOG_TABLE = 'undolog';

/**
 * The change log. Lives in the temp schema and is (re)created on activation,
 * so it never survives the connection.
 */
export function createUndoLogTable(name: string = DEFAULT_LOG_TABLE) {
  return sqliteTable(name, {
    seq: integer('seq').primaryKey(),
    /** Inverse statement, fully quoted by the trigger that wrote it */
    sql: text('sql').notNull(),
  });
}

export type UndoLogTable = ReturnType<typeof createUndoLogTable>;

export const undoLog = createUndoLogTable();
