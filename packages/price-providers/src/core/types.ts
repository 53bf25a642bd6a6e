import type { PricePoint } from '@swaptrace/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

/**
 * Stored points at floorToHour(t) and one hour later
 */
export interface PriceBracket {
  before?: PricePoint | undefined;
  after?: PricePoint | undefined;
}

export interface UpsertSummary {
  inserted: number;
  updated: number;
}

/**
 * Time-indexed price table keyed by (asset symbol, hour-aligned timestamp)
 */
export interface PriceStore {
  getBracket(assetSymbol: string, timestamp: number): Promise<Result<PriceBracket, Error>>;
  /** Writes are upserts; duplicates in the batch collapse to the last one */
  upsertBatch(points: readonly PricePoint[]): Promise<Result<UpsertSummary, Error>>;
  getRange(assetSymbol: string, from: number, to: number): Promise<Result<PricePoint[], Error>>;
}

export interface HistoryPoint {
  /** Hour-aligned unix seconds */
  timestamp: number;
  open: Decimal;
}

/**
 * Remote source of the full hourly history of one asset
 */
export interface HistoryClient {
  readonly name: string;
  fetchHistory(symbol: string): Promise<Result<HistoryPoint[], Error>>;
  close(): Promise<void>;
}

export interface ExternalQuote {
  price: Decimal;
  /** Timestamp the quote actually describes */
  timestamp: number;
}

export interface ExternalPriceService {
  readonly name: string;
  /** ok(undefined) when the service has nothing for this asset or date */
  fetchQuote(symbol: string, timestamp: number): Promise<Result<ExternalQuote | undefined, Error>>;
  close(): Promise<void>;
}

/**
 * Rate limit settings for a provider tier
 */
export interface ProviderRateLimitConfig {
  burstLimit: number;
  requestsPerHour: number;
  requestsPerMinute: number;
  requestsPerSecond: number;
}
