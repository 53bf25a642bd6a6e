/**
 * Prices database: a standalone SQLite file so backfilled history survives
 * across runs and can be shared between wallets.
 */

import { closeSqliteDatabase, createSqliteDatabase, runMigrations, type Kysely } from '@swaptrace/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { priceMigrations } from './migrations/index.js';
import type { PricesDatabase } from './schema.js';

export type PricesDB = Kysely<PricesDatabase>;

export function createPricesDatabase(dbPath: string): Result<PricesDB, Error> {
  return createSqliteDatabase<PricesDatabase>(dbPath);
}

export async function initializePricesDatabase(db: PricesDB): Promise<Result<void, Error>> {
  const result = await runMigrations(db, priceMigrations);
  if (result.isErr()) {
    return err(result.error);
  }
  return ok();
}

/**
 * Open and migrate in one step
 */
export async function openPricesDatabase(dbPath: string): Promise<Result<PricesDB, Error>> {
  const dbResult = createPricesDatabase(dbPath);
  if (dbResult.isErr()) {
    return err(dbResult.error);
  }

  const migrationResult = await initializePricesDatabase(dbResult.value);
  if (migrationResult.isErr()) {
    await closeSqliteDatabase(dbResult.value);
    return err(migrationResult.error);
  }

  return ok(dbResult.value);
}

export function closePricesDatabase(db: PricesDB): Promise<Result<void, Error>> {
  return closeSqliteDatabase(db);
}
