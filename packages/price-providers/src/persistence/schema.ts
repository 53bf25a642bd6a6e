import type { ColumnType, Generated } from '@swaptrace/sqlite';

/**
 * One hourly opening price in USD. (asset_symbol, timestamp) is unique.
 */
export interface PricePointsTable {
  id: Generated<number>;
  asset_symbol: string;
  /** Hour-aligned unix seconds */
  timestamp: number;
  /** Decimal string */
  open_price: string;
  source_provider: string;
  fetched_at: string;
  created_at: ColumnType<string, string | undefined, never>;
  updated_at: string | null;
}

export interface PricesDatabase {
  price_points: PricePointsTable;
}
