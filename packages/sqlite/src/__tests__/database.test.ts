import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { sql } from 'kysely';
import { afterEach, describe, expect, it } from 'vitest';

import { closeSqliteDatabase } from '../close.js';
import { createSqliteDatabase } from '../database.js';

describe('createSqliteDatabase', () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { force: true, recursive: true });
      tempDir = undefined;
    }
  });

  it('opens an in-memory database', async () => {
    const db = createSqliteDatabase<Record<string, never>>(':memory:')._unsafeUnwrap();

    const row = await sql<{ value: number }>`select 1 as value`.execute(db);
    expect(row.rows[0]?.value).toBe(1);

    expect((await closeSqliteDatabase(db)).isOk()).toBe(true);
  });

  it('creates missing parent directories for a file database', async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'swaptrace-sqlite-'));
    const dbPath = path.join(tempDir, 'nested', 'prices.db');

    const db = createSqliteDatabase<Record<string, never>>(dbPath)._unsafeUnwrap();
    await sql`create table t (id integer)`.execute(db);

    expect(fs.existsSync(dbPath)).toBe(true);
    expect((await closeSqliteDatabase(db)).isOk()).toBe(true);
  });
});
