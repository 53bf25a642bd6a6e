/**
 * CoinGecko daily historical quotes, used as an external fallback
 */

import { getErrorMessage, unixToDate } from '@swaptrace/core';
import { getCoinGeckoSettings } from '@swaptrace/env';
import type { HttpClient } from '@swaptrace/http';
import { RateLimitError } from '@swaptrace/http';
import { getLogger } from '@swaptrace/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { PriceDataUnavailableError } from '../../core/errors.js';
import type { ExternalPriceService, ExternalQuote, ProviderRateLimitConfig } from '../../core/types.js';
import { createProviderHttpClient } from '../../shared/shared-utils.js';

import { buildCoinIdMap, extractUsdQuote, formatCoinGeckoDate } from './coingecko-utils.js';
import { CoinGeckoHistoryResponseSchema } from './schemas.js';

const logger = getLogger('CoinGeckoPriceService');

const PROVIDER = 'coingecko';

/**
 * CoinGecko API rate limits by tier
 */
const COINGECKO_RATE_LIMITS = {
  /** No API key: 10-50 calls/minute */
  free: {
    burstLimit: 1,
    requestsPerHour: 600,
    requestsPerMinute: 10,
    requestsPerSecond: 0.17,
  } satisfies ProviderRateLimitConfig,

  /** Demo key: 30 calls/minute */
  demo: {
    burstLimit: 5,
    requestsPerHour: 1800,
    requestsPerMinute: 30,
    requestsPerSecond: 0.5,
  } satisfies ProviderRateLimitConfig,

  /** Pro key: 500 calls/minute */
  pro: {
    burstLimit: 50,
    requestsPerHour: 30_000,
    requestsPerMinute: 500,
    requestsPerSecond: 8.33,
  } satisfies ProviderRateLimitConfig,
} as const;

export interface CoinGeckoPriceServiceConfig {
  /** Falls back to COINGECKO_API_KEY */
  apiKey?: string | undefined;
  /** Extra or replacement symbol -> coin id entries */
  coinIds?: Readonly<Record<string, string>> | undefined;
  /** Falls back to COINGECKO_USE_PRO_API; needs an API key */
  useProApi?: boolean | undefined;
}

export function createCoinGeckoPriceService(config: CoinGeckoPriceServiceConfig = {}): CoinGeckoPriceService {
  const settings = getCoinGeckoSettings();
  const apiKey = config.apiKey ?? settings.apiKey;
  const useProApi = (config.useProApi ?? settings.useProApi) && apiKey !== undefined;

  const httpClient = createProviderHttpClient({
    apiKey,
    apiKeyHeader: useProApi ? 'x-cg-pro-api-key' : 'x-cg-demo-api-key',
    baseUrl: useProApi ? 'https://pro-api.coingecko.com/api/v3' : 'https://api.coingecko.com/api/v3',
    providerName: 'CoinGecko',
    rateLimit: useProApi
      ? COINGECKO_RATE_LIMITS.pro
      : apiKey
        ? COINGECKO_RATE_LIMITS.demo
        : COINGECKO_RATE_LIMITS.free,
  });

  return new CoinGeckoPriceService(httpClient, buildCoinIdMap(config.coinIds));
}

export class CoinGeckoPriceService implements ExternalPriceService {
  readonly name = PROVIDER;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly coinIds: ReadonlyMap<string, string>
  ) {}

  async fetchQuote(symbol: string, timestamp: number): Promise<Result<ExternalQuote | undefined, Error>> {
    const coinId = this.coinIds.get(symbol.toUpperCase());
    if (!coinId) {
      logger.debug(`No CoinGecko coin id for ${symbol}`);
      return ok(undefined);
    }

    const date = formatCoinGeckoDate(unixToDate(timestamp));
    const result = await this.httpClient.get(`/coins/${encodeURIComponent(coinId)}/history`, {
      query: { date, localization: 'false' },
      schema: CoinGeckoHistoryResponseSchema,
    });

    if (result.isErr()) {
      return err(
        new PriceDataUnavailableError(
          `CoinGecko request failed for ${symbol} on ${date}: ${getErrorMessage(result.error)}`,
          symbol,
          PROVIDER,
          result.error instanceof RateLimitError ? 'rate-limit' : 'upstream-error'
        )
      );
    }

    const quote = extractUsdQuote(result.value, timestamp);
    if (!quote) {
      logger.debug(`CoinGecko has no USD price for ${symbol} (${coinId}) on ${date}`);
    }
    return ok(quote);
  }

  close(): Promise<void> {
    return this.httpClient.close();
  }
}
