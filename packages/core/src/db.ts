import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

export type UndoDb = BetterSQLite3Database & { $client: Database.Database };

/**
 * Open a database connection wrapped in Drizzle, with the usual pragmas.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path: string): UndoDb {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  return drizzle(sqlite);
}

/**
 * Create an in-memory database, optionally running a schema script. For tests.
 */
export function createTestDb(schemaSql?: string): UndoDb {
  const db = createDb(':memory:');
  if (schemaSql) getRawDb(db).exec(schemaSql);
  return db;
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Used for DDL, trigger management, transactions and replaying log statements.
 */
export function getRawDb(db: UndoDb): Database.Database {
  return db.$client;
}
