import type { Decimal } from 'decimal.js';

import type { Trade } from './swap.js';

/**
 * One hourly observation (open price in USD)
 */
export interface PricePoint {
  assetSymbol: string;
  /** Hour-aligned unix seconds */
  timestamp: number;
  price: Decimal;
  source: string;
}

export const PRICE_PROVENANCES = [
  'store',
  'stablecoin',
  'external-service',
  'derived-ratio',
  'paired-ratio',
  'unavailable',
] as const;

export type PriceProvenance = (typeof PRICE_PROVENANCES)[number];

export interface PriceQuote {
  assetSymbol: string;
  /** The trade timestamp the quote was requested for */
  timestamp: number;
  /** Absent only when provenance is 'unavailable' */
  price?: Decimal | undefined;
  provenance: PriceProvenance;
  /** Timestamp of the observation the price came from, when it differs from the request */
  sourceTimestamp?: number | undefined;
}

export const UNKNOWN_SYMBOL = 'UNKNOWN';

/**
 * Store key for an asset symbol. Price series are keyed case-insensitively.
 */
export function normalizeAssetSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export interface PricedTrade {
  trade: Trade;
  symbolIn: string;
  symbolOut: string;
  decimalsIn?: number | undefined;
  decimalsOut?: number | undefined;
  quoteIn: PriceQuote;
  quoteOut: PriceQuote;
  /** Whole-unit amountIn times quoteIn.price */
  valueUsd?: Decimal | undefined;
}

export function unavailableQuote(assetSymbol: string, timestamp: number): PriceQuote {
  return { assetSymbol, timestamp, provenance: 'unavailable' };
}

export function isPriced(quote: PriceQuote): quote is PriceQuote & { price: Decimal } {
  return quote.provenance !== 'unavailable' && quote.price !== undefined;
}
