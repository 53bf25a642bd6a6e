/**
 * Pure helpers for CryptoCompare histohour pagination
 */

import { isHourAligned } from '@swaptrace/core';
import { RateLimitError } from '@swaptrace/http';

import type { HistoryPoint } from '../../core/types.js';
import { validateRawPrice } from '../../shared/shared-utils.js';

import { CryptoCompareErrorResponseSchema, type CryptoCompareOHLCV } from './schemas.js';

const RATE_LIMIT_PATTERN = /rate limit|limit exceeded|too many calls/i;
const MISSING_MARKET_PATTERN = /market does not exist|there is no data|no data for/i;

export function isRateLimitMessage(message: string): boolean {
  return RATE_LIMIT_PATTERN.test(message);
}

export function isMissingMarketMessage(message: string): boolean {
  return MISSING_MARKET_PATTERN.test(message);
}

/**
 * CryptoCompare reports rate limits as HTTP 200 with an error body.
 * Hooked into HttpClient via validateResponse.
 */
export function detectRateLimit(data: unknown): RateLimitError | undefined {
  const parsed = CryptoCompareErrorResponseSchema.safeParse(data);
  if (parsed.success && isRateLimitMessage(parsed.data.Message)) {
    return new RateLimitError(`CryptoCompare rate limit: ${parsed.data.Message}`);
  }
  return undefined;
}

/**
 * Keep hour-aligned rows with a positive open price
 */
export function toHistoryPoints(rows: readonly CryptoCompareOHLCV[], symbol: string): HistoryPoint[] {
  const points: HistoryPoint[] = [];
  for (const row of rows) {
    if (!isHourAligned(row.time)) continue;
    const price = validateRawPrice(row.open, symbol, 'CryptoCompare');
    if (price.isOk()) {
      points.push({ open: price.value, timestamp: row.time });
    }
  }
  return points;
}

export function hasOnlyNonPositiveOpens(rows: readonly CryptoCompareOHLCV[]): boolean {
  return rows.every((row) => row.open <= 0);
}

export function earliestTimestamp(rows: readonly CryptoCompareOHLCV[]): number | undefined {
  let earliest: number | undefined;
  for (const row of rows) {
    if (earliest === undefined || row.time < earliest) {
      earliest = row.time;
    }
  }
  return earliest;
}

/**
 * Deduplicate by timestamp (later pages lose to earlier ones) and sort ascending
 */
export function mergeHistoryPages(pages: readonly HistoryPoint[][]): HistoryPoint[] {
  const byTimestamp = new Map<number, HistoryPoint>();
  for (const page of pages) {
    for (const point of page) {
      if (!byTimestamp.has(point.timestamp)) {
        byTimestamp.set(point.timestamp, point);
      }
    }
  }
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}
