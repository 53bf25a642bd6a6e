import type { PricedTrade, Trade } from '@swaptrace/core';
import { UpstreamFetchError } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import { err, ok, type Result } from 'neverthrow';

import type { SwapDetector } from '../detection/swap-detector.js';
import type { TradePricer } from '../pricing/trade-pricer.js';
import type { ChainTransactionSource } from '../sources/explorer-dump-source.js';

const logger = getLogger('PricedTradeStream');

export interface TradeStreamParams {
  chain: string;
  address: string;
  source: ChainTransactionSource;
  detector: SwapDetector;
}

export interface PricedTradeStreamParams extends TradeStreamParams {
  pricer: Pick<TradePricer, 'priceTrade'>;
}

/**
 * Detected trades for one wallet on one chain, ordered by block height.
 *
 * A source failure yields a single `UpstreamFetchError` and ends the stream.
 */
export async function* streamTrades(
  params: TradeStreamParams
): AsyncGenerator<Result<Trade, UpstreamFetchError>, void, undefined> {
  const { address, chain, detector, source } = params;
  logger.info(`Streaming trades for ${address} on ${chain}`);

  const transactionsResult = await source.fetchTransactions(address);
  if (transactionsResult.isErr()) {
    yield err(upstreamError('transactions', chain, address, transactionsResult.error));
    return;
  }
  const transfersResult = await source.fetchTransfers(address);
  if (transfersResult.isErr()) {
    yield err(upstreamError('transfers', chain, address, transfersResult.error));
    return;
  }

  let count = 0;
  for (const trade of detector.detectTrades({
    subject: address,
    transactions: transactionsResult.value,
    transfers: transfersResult.value,
  })) {
    count++;
    yield ok(trade);
  }
  logger.info(`Detected ${count} trades for ${address} on ${chain}`);
}

/**
 * Detected trades with USD quotes attached, one trade priced at a time.
 *
 * A pricing failure (the price store itself failing, not a missing price) is
 * reported as an `UpstreamFetchError` and ends the stream; trades already
 * yielded stay valid.
 */
export async function* streamPricedTrades(
  params: PricedTradeStreamParams
): AsyncGenerator<Result<PricedTrade, UpstreamFetchError>, void, undefined> {
  const { address, chain, pricer } = params;

  for await (const tradeResult of streamTrades(params)) {
    if (tradeResult.isErr()) {
      yield err(tradeResult.error);
      return;
    }

    const pricedResult = await pricer.priceTrade(tradeResult.value);
    if (pricedResult.isErr()) {
      yield err(
        new UpstreamFetchError(`Failed to price trades for ${address} on ${chain}: ${pricedResult.error.message}`, chain, address, {
          cause: pricedResult.error,
          transactionId: tradeResult.value.transactionId,
        })
      );
      return;
    }
    yield ok(pricedResult.value);
  }
}

function upstreamError(what: string, chain: string, address: string, cause: Error): UpstreamFetchError {
  logger.error({ error: cause }, `Failed to fetch ${what} for ${address} on ${chain}`);
  return new UpstreamFetchError(`Failed to fetch ${what} for ${address} on ${chain}: ${cause.message}`, chain, address, {
    cause,
  });
}
