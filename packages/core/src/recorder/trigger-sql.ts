/**
 * Generates the temporary triggers that record inverse statements.
 *
 * Each trigger appends one row to the log whose text is a complete, directly
 * executable statement. Row values are quoted by SQLite's quote() when the
 * trigger fires; identifiers are quoted here, once.
 */

import type { TrackedTable } from '../types/undo.js';

export type TriggerKind = 'i' | 'u' | 'd';

/** Matches every trigger name produced by triggerName() */
export const TRIGGER_NAME_RE = /^_.*_(i|u|d)t$/;

/**
 * Escape a SQL identifier (table name, column name) by wrapping it in double
 * quotes and doubling any embedded double quote.
 */
export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/** Escape text that ends up inside a single-quoted string literal of the trigger body */
function inLiteral(text: string): string {
  return text.replace(/'/g, "''");
}

export function triggerName(table: string, kind: TriggerKind): string {
  return `_${table}_${kind}t`;
}

function header(table: TrackedTable, kind: TriggerKind, event: string): string {
  return `CREATE TEMP TRIGGER ${quoteIdentifier(triggerName(table.name, kind))} ${event} ON ${quoteIdentifier(table.name)} BEGIN`;
}

function logInsert(logTable: string, expression: string): string {
  return `  INSERT INTO ${quoteIdentifier(logTable)} VALUES(NULL,${expression});`;
}

/** After insert: log a DELETE of the new row */
export function buildInsertTrigger(table: TrackedTable, logTable: string): string {
  const target = inLiteral(quoteIdentifier(table.name));
  return [
    header(table, 'i', 'AFTER INSERT'),
    logInsert(logTable, `'DELETE FROM ${target} WHERE rowid='||new.rowid`),
    'END;',
  ].join('\n');
}

/**
 * After update: log an UPDATE that puts back the old rowid and every old
 * column value. Targets new.rowid since the update may have moved the row.
 */
export function buildUpdateTrigger(table: TrackedTable, logTable: string): string {
  const target = inLiteral(quoteIdentifier(table.name));
  const assignments = table.columns
    .map(column => `,${inLiteral(quoteIdentifier(column))}='||quote(old.${quoteIdentifier(column)})||'`)
    .join('');
  return [
    header(table, 'u', 'AFTER UPDATE'),
    logInsert(logTable, `'UPDATE ${target} SET rowid='||old.rowid||'${assignments} WHERE rowid='||new.rowid`),
    'END;',
  ].join('\n');
}

/** Before delete: log an INSERT restoring the rowid and every column */
export function buildDeleteTrigger(table: TrackedTable, logTable: string): string {
  const target = inLiteral(quoteIdentifier(table.name));
  const columns = table.columns.map(column => `,${inLiteral(quoteIdentifier(column))}`).join('');
  const values = table.columns.map(column => `,'||quote(old.${quoteIdentifier(column)})||'`).join('');
  return [
    header(table, 'd', 'BEFORE DELETE'),
    logInsert(logTable, `'INSERT INTO ${target}(rowid${columns}) VALUES('||old.rowid||'${values})'`),
    'END;',
  ].join('\n');
}

/** All three triggers for a table, in install order */
export function buildTriggers(table: TrackedTable, logTable: string): string[] {
  return [
    buildInsertTrigger(table, logTable),
    buildUpdateTrigger(table, logTable),
    buildDeleteTrigger(table, logTable),
  ];
}
