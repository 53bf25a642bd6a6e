import type { Kysely } from '@swaptrace/sqlite';
import { sql } from '@swaptrace/sqlite';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('price_points')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('asset_symbol', 'text', (col) => col.notNull())
    .addColumn('timestamp', 'integer', (col) => col.notNull())
    .addColumn('open_price', 'text', (col) => col.notNull())
    .addColumn('source_provider', 'text', (col) => col.notNull())
    .addColumn('fetched_at', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text')
    .execute();

  await db.schema
    .createIndex('idx_price_points_asset_timestamp')
    .ifNotExists()
    .on('price_points')
    .columns(['asset_symbol', 'timestamp'])
    .unique()
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('price_points').ifExists().execute();
}
