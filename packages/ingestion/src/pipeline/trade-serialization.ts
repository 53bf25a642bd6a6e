import type { PricedTrade, PriceQuote, Trade } from '@swaptrace/core';
import { formatDecimal } from '@swaptrace/core';

/**
 * JSON shapes written one per line. Keys are built in a fixed order so the same
 * trades always serialize to the same bytes; bigints and Decimals are strings.
 */

export interface TradeJson {
  transactionId: string;
  chain: string;
  blockHeight: number;
  timestamp: number;
  dex: string;
  detectedBy: string;
  assetIn: string;
  amountIn: string;
  assetOut: string;
  amountOut: string;
}

export interface QuoteJson {
  assetSymbol: string;
  price?: string | undefined;
  provenance: string;
  sourceTimestamp?: number | undefined;
}

export interface PricedTradeJson extends TradeJson {
  symbolIn: string;
  symbolOut: string;
  decimalsIn?: number | undefined;
  decimalsOut?: number | undefined;
  quoteIn: QuoteJson;
  quoteOut: QuoteJson;
  valueUsd?: string | undefined;
}

export function tradeToJson(trade: Trade): TradeJson {
  return {
    transactionId: trade.transactionId,
    chain: trade.chain,
    blockHeight: trade.blockHeight,
    timestamp: trade.timestamp,
    dex: trade.dex,
    detectedBy: trade.detectedBy,
    assetIn: trade.assetIn,
    amountIn: trade.amountIn.toString(),
    assetOut: trade.assetOut,
    amountOut: trade.amountOut.toString(),
  };
}

function quoteToJson(quote: PriceQuote): QuoteJson {
  return {
    assetSymbol: quote.assetSymbol,
    price: quote.price ? formatDecimal(quote.price) : undefined,
    provenance: quote.provenance,
    sourceTimestamp: quote.sourceTimestamp,
  };
}

export function pricedTradeToJson(priced: PricedTrade): PricedTradeJson {
  return {
    ...tradeToJson(priced.trade),
    symbolIn: priced.symbolIn,
    symbolOut: priced.symbolOut,
    decimalsIn: priced.decimalsIn,
    decimalsOut: priced.decimalsOut,
    quoteIn: quoteToJson(priced.quoteIn),
    quoteOut: quoteToJson(priced.quoteOut),
    valueUsd: priced.valueUsd ? formatDecimal(priced.valueUsd) : undefined,
  };
}

export function serializeTrade(trade: Trade): string {
  return JSON.stringify(tradeToJson(trade));
}

export function serializePricedTrade(priced: PricedTrade): string {
  return JSON.stringify(pricedTradeToJson(priced));
}
