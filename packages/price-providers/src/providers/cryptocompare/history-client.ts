/**
 * CryptoCompare hourly history client
 */

import { getErrorMessage } from '@swaptrace/core';
import { getCryptoCompareApiKey } from '@swaptrace/env';
import type { HttpClient } from '@swaptrace/http';
import { RateLimitError } from '@swaptrace/http';
import { getLogger } from '@swaptrace/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { PriceDataUnavailableError } from '../../core/errors.js';
import type { HistoryClient, HistoryPoint, ProviderRateLimitConfig } from '../../core/types.js';
import { createProviderHttpClient } from '../../shared/shared-utils.js';

import {
  detectRateLimit,
  earliestTimestamp,
  hasOnlyNonPositiveOpens,
  isMissingMarketMessage,
  mergeHistoryPages,
  toHistoryPoints,
} from './cryptocompare-utils.js';
import { CryptoCompareHistoHourResponseSchema, type CryptoCompareOHLCV } from './schemas.js';

const logger = getLogger('CryptoCompareHistoryClient');

const PROVIDER = 'cryptocompare';

/**
 * CryptoCompare API rate limits by tier
 */
const CRYPTOCOMPARE_RATE_LIMITS = {
  /** No API key: ~100k calls/month */
  free: {
    burstLimit: 5,
    requestsPerHour: 139,
    requestsPerMinute: 20,
    requestsPerSecond: 0.5,
  } satisfies ProviderRateLimitConfig,

  /** API key */
  paid: {
    burstLimit: 20,
    requestsPerHour: 1000,
    requestsPerMinute: 50,
    requestsPerSecond: 2,
  } satisfies ProviderRateLimitConfig,
} as const;

export interface CryptoCompareHistoryOptions {
  /** Rows per request (the API maximum is 2000) */
  limit?: number | undefined;
  /** Upper bound on backwards pages per asset */
  maxPages?: number | undefined;
}

export interface CryptoCompareHistoryClientConfig extends CryptoCompareHistoryOptions {
  apiKey?: string | undefined;
}

export function createCryptoCompareHistoryClient(
  config: CryptoCompareHistoryClientConfig = {}
): CryptoCompareHistoryClient {
  const apiKey = config.apiKey ?? getCryptoCompareApiKey();
  const httpClient = createProviderHttpClient({
    apiKey,
    apiKeyHeader: 'authorization',
    apiKeyPrefix: 'Apikey ',
    baseUrl: 'https://min-api.cryptocompare.com',
    providerName: 'CryptoCompare',
    rateLimit: apiKey ? CRYPTOCOMPARE_RATE_LIMITS.paid : CRYPTOCOMPARE_RATE_LIMITS.free,
  });

  return new CryptoCompareHistoryClient(httpClient, config);
}

/**
 * Walks /data/v2/histohour backwards from now until the asset's history runs out.
 */
export class CryptoCompareHistoryClient implements HistoryClient {
  readonly name = PROVIDER;
  private readonly limit: number;
  private readonly maxPages: number;

  constructor(
    private readonly httpClient: HttpClient,
    options: CryptoCompareHistoryOptions = {}
  ) {
    this.limit = options.limit ?? 2000;
    this.maxPages = options.maxPages ?? 100;
  }

  async fetchHistory(symbol: string): Promise<Result<HistoryPoint[], Error>> {
    const pages: HistoryPoint[][] = [];
    let toTs: number | undefined;
    let previousEarliest: number | undefined;

    for (let page = 1; page <= this.maxPages; page++) {
      const batchResult = await this.fetchPage(symbol, toTs);
      if (batchResult.isErr()) {
        if (page === 1) {
          return err(batchResult.error);
        }
        logger.warn(
          `Stopping history for ${symbol} at page ${page}, keeping ${pages.length} pages: ${batchResult.error.message}`
        );
        break;
      }

      const batch = batchResult.value;
      if (batch.length === 0) break;

      pages.push(toHistoryPoints(batch, symbol));

      if (batch.length < this.limit || hasOnlyNonPositiveOpens(batch)) break;

      const earliest = earliestTimestamp(batch);
      if (earliest === undefined || (previousEarliest !== undefined && earliest >= previousEarliest)) break;

      previousEarliest = earliest;
      toTs = earliest - 1;

      if (page === this.maxPages) {
        logger.warn(`Reached max pages (${this.maxPages}) for ${symbol}; older history not fetched`);
      }
    }

    const points = mergeHistoryPages(pages);
    logger.info(`Fetched ${points.length} hourly points for ${symbol} in ${pages.length} pages`);
    return ok(points);
  }

  close(): Promise<void> {
    return this.httpClient.close();
  }

  /**
   * ok([]) when the market does not exist
   */
  private async fetchPage(symbol: string, toTs: number | undefined): Promise<Result<CryptoCompareOHLCV[], Error>> {
    const result = await this.httpClient.get('/data/v2/histohour', {
      query: { fsym: symbol, limit: this.limit, toTs, tsym: 'USD' },
      schema: CryptoCompareHistoHourResponseSchema,
      validateResponse: detectRateLimit,
    });

    if (result.isErr()) {
      const reason = result.error instanceof RateLimitError ? 'rate-limit' : 'upstream-error';
      return err(
        new PriceDataUnavailableError(
          `CryptoCompare request failed for ${symbol}: ${getErrorMessage(result.error)}`,
          symbol,
          PROVIDER,
          reason
        )
      );
    }

    const response = result.value;
    if (response.Response !== 'Success') {
      const message = response.Message ?? 'Unknown error';
      if (isMissingMarketMessage(message)) {
        logger.debug(`CryptoCompare has no market for ${symbol}: ${message}`);
        return ok([]);
      }
      return err(new PriceDataUnavailableError(`CryptoCompare error for ${symbol}: ${message}`, symbol, PROVIDER, 'other'));
    }

    return ok(response.Data?.Data ?? []);
  }
}
