import type { PricedTrade, PriceQuote, Trade } from '@swaptrace/core';
import { UNKNOWN_SYMBOL, unavailableQuote } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import { err, ok, type Result } from 'neverthrow';

import type { TokenInfo, TokenMetadataService } from '../token-metadata/token-metadata-service.js';

import { computeLegValue, derivePairedQuote, type PricedLeg } from './trade-pricer-utils.js';

const logger = getLogger('TradePricer');

/**
 * Anything that can quote a USD price for a symbol at a time. PriceResolver
 * is the production implementation.
 */
export interface QuoteResolver {
  resolve(assetSymbol: string, timestamp: number): Promise<Result<PriceQuote, Error>>;
}

export interface TradePricerDependencies {
  resolver: QuoteResolver;
  tokenMetadata: TokenMetadataService;
}

/**
 * Attaches USD quotes to detected trades.
 *
 * Legs are resolved in sequence, input first. An asset without metadata is
 * quoted unavailable without asking the resolver.
 */
export class TradePricer {
  private readonly resolver: QuoteResolver;
  private readonly tokenMetadata: TokenMetadataService;

  constructor(deps: TradePricerDependencies) {
    this.resolver = deps.resolver;
    this.tokenMetadata = deps.tokenMetadata;
  }

  async priceTrade(trade: Trade): Promise<Result<PricedTrade, Error>> {
    const tokenIn = this.lookupToken(trade.chain, trade.assetIn);
    const tokenOut = this.lookupToken(trade.chain, trade.assetOut);

    const quoteInResult = await this.quoteLeg(tokenIn, trade.timestamp);
    if (quoteInResult.isErr()) {
      return err(new Error(`Failed to price ${trade.transactionId} input leg: ${quoteInResult.error.message}`));
    }
    const quoteOutResult = await this.quoteLeg(tokenOut, trade.timestamp);
    if (quoteOutResult.isErr()) {
      return err(new Error(`Failed to price ${trade.transactionId} output leg: ${quoteOutResult.error.message}`));
    }

    const legIn: PricedLeg = { amount: trade.amountIn, decimals: tokenIn?.decimals, quote: quoteInResult.value };
    const legOut: PricedLeg = { amount: trade.amountOut, decimals: tokenOut?.decimals, quote: quoteOutResult.value };

    const quoteIn = derivePairedQuote(legIn, legOut) ?? legIn.quote;
    const quoteOut = derivePairedQuote(legOut, legIn) ?? legOut.quote;

    return ok({
      decimalsIn: tokenIn?.decimals,
      decimalsOut: tokenOut?.decimals,
      quoteIn,
      quoteOut,
      symbolIn: tokenIn?.symbol ?? UNKNOWN_SYMBOL,
      symbolOut: tokenOut?.symbol ?? UNKNOWN_SYMBOL,
      trade,
      valueUsd: computeLegValue({ ...legIn, quote: quoteIn }),
    });
  }

  private lookupToken(chain: string, assetId: string): TokenInfo | undefined {
    const token = this.tokenMetadata.getToken(chain, assetId);
    if (!token) {
      logger.debug(`No metadata for ${assetId} on ${chain}`);
    }
    return token;
  }

  private quoteLeg(token: TokenInfo | undefined, timestamp: number): Promise<Result<PriceQuote, Error>> {
    if (!token) {
      return Promise.resolve(ok(unavailableQuote(UNKNOWN_SYMBOL, timestamp)));
    }
    return this.resolver.resolve(token.symbol, timestamp);
  }
}
