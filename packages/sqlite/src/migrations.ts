import { getErrorMessage, wrapError } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import { Kysely, Migrator, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

/**
 * Apply pending migrations from an in-code record keyed by name (`001_initial_schema`, ...).
 * Names sort lexically, so keep the numeric prefix.
 */
export async function runMigrations(
  // eslint-disable-next-line @typescript-eslint/no-explicit-any -- Kysely is invariant; generic param allows any schema
  db: Kysely<any>,
  migrations: Record<string, Migration>
): Promise<Result<string[], Error>> {
  try {
    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results = [] } = await migrator.migrateToLatest();

    const applied: string[] = [];
    for (const result of results) {
      if (result.status === 'Success') {
        applied.push(result.migrationName);
        logger.debug(`Migration "${result.migrationName}" applied`);
      } else if (result.status === 'Error') {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new Error(getErrorMessage(error, 'Unknown migration error')));
    }

    if (applied.length === 0) {
      logger.debug('No pending migrations');
    }
    return ok(applied);
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
