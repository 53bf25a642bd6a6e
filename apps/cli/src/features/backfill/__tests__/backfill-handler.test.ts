import type { PricePoint } from '@swaptrace/core';
import {
  closePricesDatabase,
  openPricesDatabase,
  PriceRepository,
  PriceResolver,
  type HistoryClient,
  type HistoryPoint,
  type PricesDB,
  type PriceStore,
} from '@swaptrace/price-providers';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { AssetSymbolSchema } from '../../shared/schemas.js';
import { BackfillHandler } from '../backfill-handler.js';

class StaticHistoryClient implements HistoryClient {
  readonly name = 'test-history';
  readonly requested: string[] = [];

  constructor(private readonly history: Result<HistoryPoint[], Error>) {}

  fetchHistory(symbol: string): Promise<Result<HistoryPoint[], Error>> {
    this.requested.push(symbol);
    return Promise.resolve(this.history);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}

const HISTORY: HistoryPoint[] = [
  { open: new Decimal(100), timestamp: 3600 },
  { open: new Decimal(110), timestamp: 7200 },
  { open: new Decimal(105), timestamp: 10800 },
];

describe('BackfillHandler', () => {
  let db: PricesDB;
  let store: PriceRepository;

  beforeEach(async () => {
    db = (await openPricesDatabase(':memory:'))._unsafeUnwrap();
    store = new PriceRepository(db);
  });

  afterEach(async () => {
    await closePricesDatabase(db);
  });

  it('stores the fetched history and reports the counts', async () => {
    const historyClient = new StaticHistoryClient(ok(HISTORY));
    const handler = new BackfillHandler({ historyClient, store });

    const result = await handler.execute('ETH');

    expect(result._unsafeUnwrap()).toEqual({ fetched: 3, inserted: 3, stored: 3, symbol: 'ETH', updated: 0 });
    expect(historyClient.requested).toEqual(['ETH']);
    const stored = (await store.getRange('ETH', 3600, 10800))._unsafeUnwrap();
    expect(stored.map((point) => [point.timestamp, point.price.toFixed(), point.source])).toEqual([
      [3600, '100', 'test-history'],
      [7200, '110', 'test-history'],
      [10800, '105', 'test-history'],
    ]);
  });

  it('updates instead of inserting on a second run', async () => {
    const handler = new BackfillHandler({ historyClient: new StaticHistoryClient(ok(HISTORY)), store });

    await handler.execute('ETH');
    const second = await handler.execute('ETH');

    expect(second._unsafeUnwrap()).toEqual({ fetched: 3, inserted: 0, stored: 3, symbol: 'ETH', updated: 3 });
  });

  it('stores symbols so the resolver finds them in any case', async () => {
    const symbol = AssetSymbolSchema.parse('stETH');
    const handler = new BackfillHandler({
      historyClient: new StaticHistoryClient(ok(HISTORY)),
      store,
    });

    await handler.execute(symbol);
    const quote = (await new PriceResolver({ store }).resolve('stETH', 5400))._unsafeUnwrap();

    expect(symbol).toBe('STETH');
    expect(quote.provenance).toBe('store');
    expect(quote.price?.toFixed()).toBe('105');
  });

  it('handles a history larger than the argument limit', async () => {
    const count = 150_000;
    const large: HistoryPoint[] = Array.from({ length: count }, (_, index) => ({
      open: new Decimal(1),
      timestamp: (index + 1) * 3600,
    }));
    const ranges: [string, number, number][] = [];
    const recordingStore: PriceStore = {
      getBracket: () => Promise.resolve(ok({})),
      getRange: (assetSymbol, from, to) => {
        ranges.push([assetSymbol, from, to]);
        return Promise.resolve(ok<PricePoint[]>([]));
      },
      upsertBatch: (points) => Promise.resolve(ok({ inserted: points.length, updated: 0 })),
    };
    const handler = new BackfillHandler({ historyClient: new StaticHistoryClient(ok(large)), store: recordingStore });

    const result = await handler.execute('BTC');

    expect(result._unsafeUnwrap()).toEqual({ fetched: count, inserted: count, stored: 0, symbol: 'BTC', updated: 0 });
    expect(ranges).toEqual([['BTC', 3600, count * 3600]]);
  });

  it('reports an empty history without writing', async () => {
    const handler = new BackfillHandler({ historyClient: new StaticHistoryClient(ok([])), store });

    const result = await handler.execute('XYZ');

    expect(result._unsafeUnwrap()).toEqual({ fetched: 0, inserted: 0, stored: 0, symbol: 'XYZ', updated: 0 });
  });

  it('returns history client failures', async () => {
    const handler = new BackfillHandler({
      historyClient: new StaticHistoryClient(err(new Error('rate limited'))),
      store,
    });

    const result = await handler.execute('ETH');

    expect(result._unsafeUnwrapErr().message).toBe('rate limited');
  });

  it('needs a history client', async () => {
    const handler = new BackfillHandler({ historyClient: undefined, store });

    const result = await handler.execute('ETH');

    expect(result._unsafeUnwrapErr().message).toBe('No history client configured; backfill needs network access');
  });
});
