import type { HttpClient } from '@swaptrace/http';
import { HttpError } from '@swaptrace/http';
import { err, ok } from 'neverthrow';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PriceDataUnavailableError } from '../../../core/errors.js';
import { buildCoinIdMap } from '../coingecko-utils.js';
import { CoinGeckoPriceService } from '../price-service.js';

describe('CoinGeckoPriceService', () => {
  let httpGet: ReturnType<typeof vi.fn>;
  let service: CoinGeckoPriceService;

  beforeEach(() => {
    httpGet = vi.fn();
    const httpClient = { get: httpGet } as unknown as HttpClient;
    service = new CoinGeckoPriceService(httpClient, buildCoinIdMap());
  });

  it('requests the daily history for the mapped coin id', async () => {
    httpGet.mockResolvedValueOnce(ok({ id: 'wrapped-bitcoin', market_data: { current_price: { usd: 42_000.5 } } }));

    // 2024-01-15T13:20:00Z
    const result = await service.fetchQuote('wbtc', 1_705_324_800);

    const quote = result._unsafeUnwrap();
    expect(quote?.price.toFixed()).toBe('42000.5');
    expect(quote?.timestamp).toBe(1_705_276_800);
    expect(httpGet).toHaveBeenCalledWith(
      '/coins/wrapped-bitcoin/history',
      expect.objectContaining({ query: { date: '15-01-2024', localization: 'false' } })
    );
  });

  it('returns undefined for symbols without a coin id and makes no request', async () => {
    const result = await service.fetchQuote('XYZ', 1_705_324_800);

    expect(result._unsafeUnwrap()).toBeUndefined();
    expect(httpGet).not.toHaveBeenCalled();
  });

  it('returns undefined when the coin has no market data for the day', async () => {
    httpGet.mockResolvedValueOnce(ok({ id: 'ethereum' }));

    const result = await service.fetchQuote('ETH', 1_705_324_800);

    expect(result._unsafeUnwrap()).toBeUndefined();
  });

  it('wraps HTTP failures in PriceDataUnavailableError', async () => {
    httpGet.mockResolvedValueOnce(err(new HttpError('HTTP 404: Not Found', 404, 'Not Found')));

    const result = await service.fetchQuote('ETH', 1_705_324_800);

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(PriceDataUnavailableError);
    expect(error.message).toBe('CoinGecko request failed for ETH on 15-01-2024: HTTP 404: Not Found');
  });
});
