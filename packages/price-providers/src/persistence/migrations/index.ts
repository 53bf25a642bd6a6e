import type { Migration } from '@swaptrace/sqlite';

import * as initialSchema from './001_initial_schema.js';

export const priceMigrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};
