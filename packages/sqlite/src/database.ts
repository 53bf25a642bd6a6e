import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

/**
 * Open (creating the parent directory if needed) a SQLite file and wrap it in Kysely.
 * `:memory:` gives a throwaway database.
 */
export function createSqliteDatabase<T>(dbPath: string): Result<Kysely<T>, Error> {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');
    sqliteDb.pragma('busy_timeout = 5000');
    sqliteDb.pragma('temp_store = memory');

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<T>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}
