import type { HttpClient } from '@swaptrace/http';
import { RateLimitError } from '@swaptrace/http';
import { err, ok } from 'neverthrow';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PriceDataUnavailableError } from '../../../core/errors.js';
import { CryptoCompareHistoryClient } from '../history-client.js';

const row = (time: number, open: number) => ({ close: open, high: open, low: open, open, time });

const success = (rows: ReturnType<typeof row>[]) => ok({ Data: { Data: rows }, Response: 'Success' });

const summarize = (points: { open: { toFixed(): string }; timestamp: number }[]) =>
  points.map((p) => [p.timestamp, p.open.toFixed()]);

describe('CryptoCompareHistoryClient', () => {
  let httpGet: ReturnType<typeof vi.fn>;
  let httpClient: HttpClient;

  beforeEach(() => {
    httpGet = vi.fn();
    httpClient = { close: vi.fn().mockResolvedValue(undefined), get: httpGet } as unknown as HttpClient;
  });

  it('pages backwards from the earliest row until a short page', async () => {
    httpGet
      .mockResolvedValueOnce(success([row(7200, 2), row(10_800, 3), row(14_400, 4)]))
      .mockResolvedValueOnce(success([row(3600, 1)]));
    const client = new CryptoCompareHistoryClient(httpClient, { limit: 3 });

    const result = await client.fetchHistory('ETH');

    expect(summarize(result._unsafeUnwrap())).toEqual([
      [3600, '1'],
      [7200, '2'],
      [10_800, '3'],
      [14_400, '4'],
    ]);
    expect(httpGet).toHaveBeenCalledTimes(2);
    expect(httpGet).toHaveBeenNthCalledWith(
      1,
      '/data/v2/histohour',
      expect.objectContaining({ query: { fsym: 'ETH', limit: 3, toTs: undefined, tsym: 'USD' } })
    );
    expect(httpGet).toHaveBeenNthCalledWith(
      2,
      '/data/v2/histohour',
      expect.objectContaining({ query: { fsym: 'ETH', limit: 3, toTs: 7199, tsym: 'USD' } })
    );
  });

  it('drops rows with a non-positive open or an unaligned time', async () => {
    httpGet.mockResolvedValueOnce(success([row(3600, 0), row(7200, 5), row(7300, 6)]));
    const client = new CryptoCompareHistoryClient(httpClient, { limit: 10 });

    const result = await client.fetchHistory('ETH');

    expect(summarize(result._unsafeUnwrap())).toEqual([[7200, '5']]);
  });

  it('stops when a full page has only zero opens', async () => {
    httpGet.mockResolvedValue(success([row(3600, 0), row(7200, 0)]));
    const client = new CryptoCompareHistoryClient(httpClient, { limit: 2 });

    const result = await client.fetchHistory('NEW');

    expect(result._unsafeUnwrap()).toEqual([]);
    expect(httpGet).toHaveBeenCalledTimes(1);
  });

  it('stops when the earliest timestamp does not move back', async () => {
    httpGet.mockResolvedValue(success([row(3600, 1), row(7200, 2)]));
    const client = new CryptoCompareHistoryClient(httpClient, { limit: 2 });

    const result = await client.fetchHistory('ETH');

    expect(httpGet).toHaveBeenCalledTimes(2);
    expect(summarize(result._unsafeUnwrap())).toEqual([
      [3600, '1'],
      [7200, '2'],
    ]);
  });

  it('stops after maxPages', async () => {
    httpGet
      .mockResolvedValueOnce(success([row(36_000, 10), row(39_600, 11)]))
      .mockResolvedValueOnce(success([row(28_800, 8), row(32_400, 9)]))
      .mockResolvedValueOnce(success([row(21_600, 6), row(25_200, 7)]));
    const client = new CryptoCompareHistoryClient(httpClient, { limit: 2, maxPages: 2 });

    const result = await client.fetchHistory('ETH');

    expect(httpGet).toHaveBeenCalledTimes(2);
    expect(result._unsafeUnwrap()).toHaveLength(4);
  });

  it('returns an empty history when the market does not exist', async () => {
    httpGet.mockResolvedValueOnce(
      ok({ Data: {}, Message: 'cccagg_or_exchange market does not exist for this coin pair (XYZ-USD)', Response: 'Error' })
    );
    const client = new CryptoCompareHistoryClient(httpClient);

    const result = await client.fetchHistory('XYZ');

    expect(result._unsafeUnwrap()).toEqual([]);
  });

  it('returns an error for any other first-page API error', async () => {
    httpGet.mockResolvedValueOnce(ok({ Data: {}, Message: 'fsym param is invalid', Response: 'Error' }));
    const client = new CryptoCompareHistoryClient(httpClient);

    const result = await client.fetchHistory('ETH');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(PriceDataUnavailableError);
    expect(error.message).toBe('CryptoCompare error for ETH: fsym param is invalid');
  });

  it('tags rate limit failures on the first page', async () => {
    httpGet.mockResolvedValueOnce(err(new RateLimitError('CryptoCompare rate limit exceeded')));
    const client = new CryptoCompareHistoryClient(httpClient);

    const result = await client.fetchHistory('ETH');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(PriceDataUnavailableError);
    if (error instanceof PriceDataUnavailableError) {
      expect(error.reason).toBe('rate-limit');
      expect(error.message).toBe('CryptoCompare request failed for ETH: CryptoCompare rate limit exceeded');
    }
  });

  it('keeps earlier pages when a later page fails', async () => {
    httpGet
      .mockResolvedValueOnce(success([row(3600, 1), row(7200, 2)]))
      .mockResolvedValueOnce(err(new Error('socket hang up')));
    const client = new CryptoCompareHistoryClient(httpClient, { limit: 2 });

    const result = await client.fetchHistory('ETH');

    expect(summarize(result._unsafeUnwrap())).toEqual([
      [3600, '1'],
      [7200, '2'],
    ]);
  });

  it('closes the underlying HTTP client', async () => {
    const client = new CryptoCompareHistoryClient(httpClient);
    await client.close();
    expect(httpClient.close).toHaveBeenCalledTimes(1);
  });
});
