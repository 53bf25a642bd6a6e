import type { RawTransfer, TransactionContext } from '@swaptrace/core';
import { isValidUnixTimestamp, MalformedInputError } from '@swaptrace/core';
import { err, ok, type Result } from 'neverthrow';

import { normalizeAddress, type ChainConfig } from '../registry/chain-registry.js';

export type TransferDirection = 'in' | 'out';

/**
 * Summed raw amount for one asset in one direction
 */
export interface AssetFlow {
  assetId: string;
  amount: bigint;
}

/**
 * The subject's view of one transaction's transfers
 */
export interface TransferFlows {
  /** Outbound token assets, summed per asset, first-seen order */
  sent: AssetFlow[];
  /** Inbound token assets, summed per asset, first-seen order */
  received: AssetFlow[];
  /** Inbound minus outbound native and internal amounts */
  nativeDelta: bigint;
}

/**
 * Direction of a transfer relative to the subject, or undefined when it does not
 * move the subject's balance (unrelated parties or a self-transfer).
 *
 * Rows without either party are balance changes and take their direction from
 * the sign. When parties are present they decide, and a negative amount only
 * counts as outbound when the subject is the sender.
 */
export function getTransferDirection(
  transfer: RawTransfer,
  subject: string,
  chain: ChainConfig
): TransferDirection | undefined {
  const from = transfer.from ? normalizeAddress(chain.family, transfer.from) : undefined;
  const to = transfer.to ? normalizeAddress(chain.family, transfer.to) : undefined;

  if (!from && !to) {
    if (transfer.amount < 0n) return 'out';
    if (transfer.amount > 0n) return 'in';
    return undefined;
  }

  if (from === subject && to === subject) return undefined;
  if (from === subject) return 'out';
  if (to === subject && transfer.amount >= 0n) return 'in';
  return undefined;
}

function absolute(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Add an amount to the per-asset running sum. Map insertion order records first-seen.
 */
function accumulate(sums: Map<string, bigint>, assetId: string, amount: bigint): void {
  sums.set(assetId, (sums.get(assetId) ?? 0n) + amount);
}

function toFlows(sums: Map<string, bigint>): AssetFlow[] {
  return Array.from(sums, ([assetId, amount]) => ({ amount, assetId }));
}

/**
 * Aggregate one transaction's transfers from the subject's point of view.
 *
 * Token transfers of the same asset and direction sum. Native and internal
 * transfers (and token rows carrying the native sentinel) only feed the native delta.
 */
export function summarizeTransferFlows(
  transfers: readonly RawTransfer[],
  subject: string,
  chain: ChainConfig
): TransferFlows {
  const sent = new Map<string, bigint>();
  const received = new Map<string, bigint>();
  let nativeDelta = 0n;

  for (const transfer of transfers) {
    const direction = getTransferDirection(transfer, subject, chain);
    if (!direction) continue;

    const amount = absolute(transfer.amount);
    const assetId = normalizeAddress(chain.family, transfer.assetId);
    const isNative = transfer.kind !== 'token' || assetId === chain.nativeAsset;

    if (isNative) {
      nativeDelta += direction === 'in' ? amount : -amount;
    } else if (direction === 'out') {
      accumulate(sent, assetId, amount);
    } else {
      accumulate(received, assetId, amount);
    }
  }

  return { nativeDelta, received: toFlows(received), sent: toFlows(sent) };
}

/**
 * The asset with the greatest summed amount. Ties go to the first-seen asset.
 */
export function selectLargestFlow(flows: readonly AssetFlow[]): AssetFlow | undefined {
  let largest: AssetFlow | undefined;
  for (const flow of flows) {
    if (!largest || flow.amount > largest.amount) {
      largest = flow;
    }
  }
  return largest;
}

export function validateTransactionContext(
  context: TransactionContext
): Result<TransactionContext, MalformedInputError> {
  if (!context.transactionId || context.transactionId.trim() === '') {
    return err(new MalformedInputError('Transaction has an empty id', 'transaction'));
  }

  if (!Number.isFinite(context.blockHeight) || context.blockHeight < 0) {
    return err(
      new MalformedInputError(`Transaction has an invalid block height: ${context.blockHeight}`, 'transaction', {
        transactionId: context.transactionId,
      })
    );
  }

  if (!isValidUnixTimestamp(context.timestamp)) {
    return err(
      new MalformedInputError(`Transaction has an invalid timestamp: ${context.timestamp}`, 'transaction', {
        transactionId: context.transactionId,
      })
    );
  }

  return ok(context);
}

export function validateTransfer(
  transfer: RawTransfer,
  expectedTransactionId: string
): Result<RawTransfer, MalformedInputError> {
  const context = { transactionId: transfer.transactionId || undefined };

  if (transfer.transactionId !== expectedTransactionId) {
    return err(
      new MalformedInputError(`Transfer references unknown transaction ${transfer.transactionId}`, 'transfer', context)
    );
  }

  if (!transfer.assetId || transfer.assetId.trim() === '') {
    return err(new MalformedInputError('Transfer has an empty asset id', 'transfer', context));
  }

  if (typeof transfer.amount !== 'bigint') {
    return err(
      new MalformedInputError(`Transfer amount is not an integer: ${String(transfer.amount)}`, 'transfer', context)
    );
  }

  return ok(transfer);
}
