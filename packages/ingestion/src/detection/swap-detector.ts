import type { RawTransfer, Trade, TransactionContext } from '@swaptrace/core';
import { MalformedInputError, UNKNOWN_DEX } from '@swaptrace/core';
import { getLogger, type Logger } from '@swaptrace/logger';
import { err, ok, type Result } from 'neverthrow';

import { groupTransfersByTransaction, type GroupingStats } from '../grouping/transfer-grouper.js';
import { normalizeAddress, type ChainConfig } from '../registry/chain-registry.js';

import {
  classifyTransaction,
  SWAP_PREDICATES,
  toSwapSignal,
  type SwapMatch,
  type SwapPredicate,
} from './classification.js';
import {
  selectLargestFlow,
  summarizeTransferFlows,
  validateTransactionContext,
  validateTransfer,
  type AssetFlow,
  type TransferFlows,
} from './detector-utils.js';

export interface TradeLegs {
  assetIn: string;
  amountIn: bigint;
  assetOut: string;
  amountOut: bigint;
}

/**
 * Turn a classified transaction's flows into the sent and received legs.
 *
 * Token legs are the largest summed asset per direction. A native-leg match takes
 * the native side from the native delta; router and selector matches use the
 * native delta only to fill a missing token side. Returns undefined when the
 * result is not a swap (nothing sent, nothing received, same asset, zero amount).
 */
export function buildTradeLegs(match: SwapMatch, flows: TransferFlows, chain: ChainConfig): TradeLegs | undefined {
  const nativeSent: AssetFlow | undefined =
    flows.nativeDelta < 0n ? { amount: -flows.nativeDelta, assetId: chain.nativeAsset } : undefined;
  const nativeReceived: AssetFlow | undefined =
    flows.nativeDelta > 0n ? { amount: flows.nativeDelta, assetId: chain.nativeAsset } : undefined;

  let sent = selectLargestFlow(flows.sent);
  let received = selectLargestFlow(flows.received);

  if (match.kind === 'native-leg') {
    if (nativeReceived) {
      received = nativeReceived;
    } else {
      sent = nativeSent;
    }
  } else if (match.kind === 'router-match' || match.kind === 'selector-match') {
    sent ??= nativeSent;
    received ??= nativeReceived;
  }

  if (!sent || !received) return undefined;
  if (sent.assetId === received.assetId) return undefined;
  if (sent.amount <= 0n || received.amount <= 0n) return undefined;

  return {
    amountIn: sent.amount,
    amountOut: received.amount,
    assetIn: sent.assetId,
    assetOut: received.assetId,
  };
}

export interface SwapDetectorOptions {
  /** Classification strategies in precedence order */
  predicates?: readonly SwapPredicate[] | undefined;
  /** Called for every skipped record, after it is logged */
  onMalformedInput?: ((error: MalformedInputError) => void) | undefined;
}

export interface DetectTradesInput {
  transactions: readonly TransactionContext[];
  transfers: readonly RawTransfer[];
  /** Wallet whose point of view decides direction */
  subject: string;
}

/**
 * Classifies transactions as swaps for one chain.
 *
 * Pure apart from logging: the same input always yields the same trades in the same order.
 */
export class SwapDetector {
  private readonly logger: Logger;
  private readonly predicates: readonly SwapPredicate[];
  private readonly onMalformedInput: ((error: MalformedInputError) => void) | undefined;

  constructor(
    private readonly chain: ChainConfig,
    options: SwapDetectorOptions = {}
  ) {
    this.logger = getLogger(`SwapDetector:${chain.name}`);
    this.predicates = options.predicates ?? SWAP_PREDICATES;
    this.onMalformedInput = options.onMalformedInput;
  }

  /**
   * Classify one transaction. Malformed transfers are skipped; a malformed
   * context is an error. `ok(undefined)` means the transaction is not a swap.
   */
  detect(
    context: TransactionContext,
    transfers: readonly RawTransfer[],
    subject: string
  ): Result<Trade | undefined, MalformedInputError> {
    const contextResult = validateTransactionContext(context);
    if (contextResult.isErr()) {
      return err(contextResult.error);
    }

    const validTransfers: RawTransfer[] = [];
    for (const transfer of transfers) {
      const transferResult = validateTransfer(transfer, context.transactionId);
      if (transferResult.isErr()) {
        this.reportMalformed(transferResult.error);
        continue;
      }
      validTransfers.push(transferResult.value);
    }

    if (context.success === false) {
      this.logger.debug(`Skipping failed transaction ${context.transactionId}`);
      return ok(undefined);
    }

    const normalizedSubject = normalizeAddress(this.chain.family, subject);
    const flows = summarizeTransferFlows(validTransfers, normalizedSubject, this.chain);
    const classification = classifyTransaction({ chain: this.chain, context, flows }, this.predicates);

    if (classification.kind === 'no-match') {
      return ok(undefined);
    }

    const legs = buildTradeLegs(classification, flows, this.chain);
    if (!legs) {
      this.logger.debug(
        `Transaction ${context.transactionId} matched ${classification.kind} but has no distinct sent/received pair`
      );
      return ok(undefined);
    }

    return ok({
      ...legs,
      blockHeight: context.blockHeight,
      chain: this.chain.name,
      detectedBy: toSwapSignal(classification),
      dex: classification.kind === 'router-match' ? classification.dex : UNKNOWN_DEX,
      timestamp: context.timestamp,
      transactionId: context.transactionId,
    });
  }

  /**
   * Lazily yield the trades in a batch, ordered by ascending block height
   * (input order on ties). Malformed records are logged and skipped.
   */
  *detectTrades(input: DetectTradesInput): Generator<Trade, void, undefined> {
    const contexts = new Map<string, TransactionContext>();
    for (const context of input.transactions) {
      const result = validateTransactionContext(context);
      if (result.isErr()) {
        this.reportMalformed(result.error);
        continue;
      }
      if (contexts.has(context.transactionId)) {
        this.logger.warn(`Duplicate transaction ${context.transactionId}; keeping the first occurrence`);
        continue;
      }
      contexts.set(context.transactionId, context);
    }

    const stats: GroupingStats = { skipped: 0 };
    const groups = groupTransfersByTransaction(input.transfers, stats);
    if (stats.skipped > 0) {
      this.logger.warn(`Skipped ${stats.skipped} transfers without a transaction id`);
    }

    for (const [transactionId, transfers] of groups) {
      if (contexts.has(transactionId)) continue;
      for (const transfer of transfers) {
        this.reportMalformed(
          new MalformedInputError(`Transfer references unknown transaction ${transactionId}`, 'transfer', {
            additionalContext: { assetId: transfer.assetId },
            transactionId,
          })
        );
      }
    }

    const ordered = Array.from(contexts.values()).sort((a, b) => a.blockHeight - b.blockHeight);

    for (const context of ordered) {
      const result = this.detect(context, groups.get(context.transactionId) ?? [], input.subject);
      if (result.isErr()) {
        this.reportMalformed(result.error);
        continue;
      }
      if (result.value) {
        yield result.value;
      }
    }
  }

  private reportMalformed(error: MalformedInputError): void {
    this.logger.warn({ error }, `Skipping malformed ${error.record}: ${error.message}`);
    this.onMalformedInput?.(error);
  }
}
