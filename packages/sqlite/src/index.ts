export { createSqliteDatabase } from './database.js';
export { runMigrations } from './migrations.js';
export { closeSqliteDatabase } from './close.js';

// Consumers get the Kysely types they need without a direct kysely dependency
export {
  Kysely,
  sql,
  type ColumnType,
  type Generated,
  type Insertable,
  type Migration,
  type Selectable,
  type Transaction,
} from 'kysely';
