/**
 * Pure helpers for CoinGecko requests and responses
 */

import { startOfUtcDay } from '@swaptrace/core';

import type { ExternalQuote } from '../../core/types.js';
import { validateRawPrice } from '../../shared/shared-utils.js';

import coinIdsJson from './coingecko-coin-ids.json' with { type: 'json' };
import { CoinGeckoCoinIdsSchema, type CoinGeckoHistoryResponse } from './schemas.js';

/**
 * Format date for CoinGecko API (DD-MM-YYYY, UTC)
 */
export function formatCoinGeckoDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const year = date.getUTCFullYear();

  return `${day}-${month}-${year}`;
}

/**
 * Symbol (uppercased) to CoinGecko coin id. Overrides win over the bundled table.
 */
export function buildCoinIdMap(overrides: Readonly<Record<string, string>> = {}): Map<string, string> {
  const bundled = CoinGeckoCoinIdsSchema.parse(coinIdsJson);
  const map = new Map<string, string>();
  for (const [symbol, coinId] of Object.entries({ ...bundled, ...overrides })) {
    map.set(symbol.toUpperCase(), coinId);
  }
  return map;
}

/**
 * USD price from a history response, stamped at 00:00 UTC of the requested day.
 * undefined when the response has no usable USD price.
 */
export function extractUsdQuote(response: CoinGeckoHistoryResponse, timestamp: number): ExternalQuote | undefined {
  const usd = response.market_data?.current_price.usd;
  const price = validateRawPrice(usd, response.id, 'CoinGecko');
  if (price.isErr()) {
    return undefined;
  }
  return { price: price.value, timestamp: startOfUtcDay(timestamp) };
}
