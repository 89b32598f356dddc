import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createDb, createTestDb, getRawDb } from '../src/db.js';

describe('createDb', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sqlite-undo-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('opens the named file, creating missing directories', () => {
    const path = join(dir, 'nested', 'app.db');
    const db = createDb(path);

    expect(existsSync(path)).toBe(true);
    expect(getRawDb(db).pragma('journal_mode', { simple: true })).toBe('wal');
    expect(getRawDb(db).pragma('foreign_keys', { simple: true })).toBe(1);
    getRawDb(db).close();
  });
});

describe('createTestDb', () => {
  it('runs the schema script', () => {
    const db = createTestDb('CREATE TABLE t(a);');
    expect(getRawDb(db).prepare("SELECT name FROM sqlite_master WHERE type = 'table'").pluck().all()).toEqual(['t']);
  });
});
