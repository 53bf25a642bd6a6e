import type { PricePoint } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import type { PriceServices, PriceStore } from '@swaptrace/price-providers';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('BackfillHandler');

export interface BackfillResult {
  symbol: string;
  /** Points returned by the history client */
  fetched: number;
  inserted: number;
  updated: number;
  /** Points stored for the fetched range after the upsert */
  stored: number;
}

function timestampRange(points: readonly PricePoint[]): { from: number; to: number } {
  return points.reduce(
    (range, point) => ({ from: Math.min(range.from, point.timestamp), to: Math.max(range.to, point.timestamp) }),
    { from: Number.POSITIVE_INFINITY, to: Number.NEGATIVE_INFINITY }
  );
}

/**
 * Fetches the full hourly history of one asset and upserts it into the store.
 */
export class BackfillHandler {
  constructor(private readonly services: Pick<PriceServices, 'historyClient'> & { store: PriceStore }) {}

  async execute(symbol: string): Promise<Result<BackfillResult, Error>> {
    const historyClient = this.services.historyClient;
    if (!historyClient) {
      return err(new Error('No history client configured; backfill needs network access'));
    }

    const historyResult = await historyClient.fetchHistory(symbol);
    if (historyResult.isErr()) {
      return err(historyResult.error);
    }

    const points: PricePoint[] = historyResult.value.map((point) => ({
      assetSymbol: symbol,
      price: point.open,
      source: historyClient.name,
      timestamp: point.timestamp,
    }));
    if (points.length === 0) {
      logger.info(`${historyClient.name} has no history for ${symbol}`);
      return ok({ fetched: 0, inserted: 0, stored: 0, symbol, updated: 0 });
    }

    const upsertResult = await this.services.store.upsertBatch(points);
    if (upsertResult.isErr()) {
      return err(upsertResult.error);
    }

    const { from, to } = timestampRange(points);
    const rangeResult = await this.services.store.getRange(symbol, from, to);
    if (rangeResult.isErr()) {
      return err(rangeResult.error);
    }

    logger.info(
      `Backfilled ${symbol}: ${points.length} points (inserted ${upsertResult.value.inserted}, updated ${upsertResult.value.updated})`
    );
    return ok({
      fetched: points.length,
      inserted: upsertResult.value.inserted,
      stored: rangeResult.value.length,
      symbol,
      updated: upsertResult.value.updated,
    });
  }
}
