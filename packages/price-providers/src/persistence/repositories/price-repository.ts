import type { PricePoint } from '@swaptrace/core';
import {
  floorToHour,
  isHourAligned,
  normalizeAssetSymbol,
  parseDecimal,
  SECONDS_PER_HOUR,
  wrapError,
} from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import type { Selectable } from '@swaptrace/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { PriceBracket, PriceStore, UpsertSummary } from '../../core/types.js';
import type { PricesDB } from '../database.js';
import type { PricePointsTable } from '../schema.js';

const LOOKUP_CHUNK_SIZE = 500;
const INSERT_CHUNK_SIZE = 100;

const pointKey = (assetSymbol: string, timestamp: number): string => `${assetSymbol}|${timestamp}`;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Kysely-backed PriceStore over the price_points table. Symbols are stored and
 * matched in their normalized (uppercase) form.
 */
export class PriceRepository implements PriceStore {
  private readonly logger = getLogger('PriceRepository');

  constructor(
    private readonly db: PricesDB,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getBracket(assetSymbol: string, timestamp: number): Promise<Result<PriceBracket, Error>> {
    try {
      const symbol = normalizeAssetSymbol(assetSymbol);
      const beforeTs = floorToHour(timestamp);
      const afterTs = beforeTs + SECONDS_PER_HOUR;

      const rows = await this.db
        .selectFrom('price_points')
        .selectAll()
        .where('asset_symbol', '=', symbol)
        .where('timestamp', 'in', [beforeTs, afterTs])
        .execute();

      const bracket: PriceBracket = {};
      for (const row of rows) {
        if (row.timestamp === beforeTs) {
          bracket.before = this.toPricePoint(row);
        } else {
          bracket.after = this.toPricePoint(row);
        }
      }
      return ok(bracket);
    } catch (error) {
      this.logger.error({ error }, `Failed to read price bracket for ${assetSymbol} at ${timestamp}`);
      return wrapError(error, `Failed to read price bracket for ${assetSymbol}`);
    }
  }

  async upsertBatch(points: readonly PricePoint[]): Promise<Result<UpsertSummary, Error>> {
    const deduped = new Map<string, PricePoint>();
    for (const point of points) {
      if (!isHourAligned(point.timestamp)) {
        return err(new Error(`Price point for ${point.assetSymbol} at ${point.timestamp} is not hour-aligned`));
      }
      const assetSymbol = normalizeAssetSymbol(point.assetSymbol);
      deduped.set(pointKey(assetSymbol, point.timestamp), { ...point, assetSymbol });
    }

    if (deduped.size === 0) {
      return ok({ inserted: 0, updated: 0 });
    }

    try {
      const existing = await this.findExistingKeys([...deduped.values()]);
      const fetchedAt = this.now().toISOString();

      const rows = [...deduped.values()].map((point) => ({
        asset_symbol: point.assetSymbol,
        fetched_at: fetchedAt,
        open_price: point.price.toFixed(),
        source_provider: point.source,
        timestamp: point.timestamp,
        updated_at: null,
      }));

      await this.db.transaction().execute(async (trx) => {
        for (const batch of chunk(rows, INSERT_CHUNK_SIZE)) {
          await trx
            .insertInto('price_points')
            .values(batch)
            .onConflict((oc) =>
              oc.columns(['asset_symbol', 'timestamp']).doUpdateSet((eb) => ({
                fetched_at: eb.ref('excluded.fetched_at'),
                open_price: eb.ref('excluded.open_price'),
                source_provider: eb.ref('excluded.source_provider'),
                updated_at: fetchedAt,
              }))
            )
            .execute();
        }
      });

      const summary = { inserted: deduped.size - existing.size, updated: existing.size };
      this.logger.debug(
        `Upserted ${deduped.size} price points - Inserted: ${summary.inserted}, Updated: ${summary.updated}`
      );
      return ok(summary);
    } catch (error) {
      this.logger.error({ error }, 'Failed to upsert price points');
      return wrapError(error, 'Failed to upsert price points');
    }
  }

  async getRange(assetSymbol: string, from: number, to: number): Promise<Result<PricePoint[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('price_points')
        .selectAll()
        .where('asset_symbol', '=', normalizeAssetSymbol(assetSymbol))
        .where('timestamp', '>=', from)
        .where('timestamp', '<=', to)
        .orderBy('timestamp', 'asc')
        .execute();

      return ok(rows.map((row) => this.toPricePoint(row)));
    } catch (error) {
      this.logger.error({ error }, `Failed to read price range for ${assetSymbol}`);
      return wrapError(error, `Failed to read price range for ${assetSymbol}`);
    }
  }

  private async findExistingKeys(points: readonly PricePoint[]): Promise<Set<string>> {
    const timestampsBySymbol = new Map<string, number[]>();
    for (const point of points) {
      const timestamps = timestampsBySymbol.get(point.assetSymbol) ?? [];
      timestamps.push(point.timestamp);
      timestampsBySymbol.set(point.assetSymbol, timestamps);
    }

    const existing = new Set<string>();
    for (const [assetSymbol, timestamps] of timestampsBySymbol) {
      for (const batch of chunk(timestamps, LOOKUP_CHUNK_SIZE)) {
        const rows = await this.db
          .selectFrom('price_points')
          .select('timestamp')
          .where('asset_symbol', '=', assetSymbol)
          .where('timestamp', 'in', batch)
          .execute();
        for (const row of rows) {
          existing.add(pointKey(assetSymbol, row.timestamp));
        }
      }
    }
    return existing;
  }

  private toPricePoint(row: Selectable<PricePointsTable>): PricePoint {
    return {
      assetSymbol: row.asset_symbol,
      price: parseDecimal(row.open_price),
      source: row.source_provider,
      timestamp: row.timestamp,
    };
  }
}
