import type { RawTransfer, TransactionContext, TransferKind } from '@swaptrace/core';

import { normalizeAddress, type ChainConfig, type ChainFamily } from '../registry/chain-registry.js';

import type { BalanceChangeRow, BalanceChangeTransactionRow, EvmNormalTransactionRow } from './dump-schemas.js';

/**
 * Pure functions mapping validated dump rows to transaction contexts and transfers.
 */

const SELECTOR_PATTERN = /^0x[0-9a-f]{8}/i;
const SUI_NATIVE_COIN_PATTERN = /^0x0*2::sui::sui$/;

/**
 * EVM hashes are hex and compare case-insensitively; Solana signatures and Sui
 * digests are base58 and do not.
 */
export function normalizeTransactionId(family: ChainFamily, hash: string): string {
  const trimmed = hash.trim();
  return family === 'evm' ? trimmed.toLowerCase() : trimmed;
}

/**
 * First four bytes of the call data, or undefined for plain transfers
 */
export function extractSelector(input: string | undefined): string | undefined {
  if (!input) return undefined;
  const match = SELECTOR_PATTERN.exec(input);
  return match ? match[0].toLowerCase() : undefined;
}

/**
 * Sui coin types are trimmed and lowercased; the long form of the native coin
 * (`0x000...0002::sui::SUI`) collapses to the registry sentinel.
 */
export function normalizeSuiCoinType(coinType: string, chain: ChainConfig): string {
  const normalized = normalizeAddress('sui', coinType);
  return SUI_NATIVE_COIN_PATTERN.test(normalized) ? chain.nativeAsset : normalized;
}

export function mapEvmNormalTransaction(row: EvmNormalTransactionRow, chain: ChainConfig): TransactionContext {
  return {
    blockHeight: row.blockNumber,
    fromAddress: row.from ? normalizeAddress(chain.family, row.from) : undefined,
    selector: extractSelector(row.input),
    success: row.isError !== '1',
    timestamp: row.timeStamp,
    toAddress: row.to ? normalizeAddress(chain.family, row.to) : undefined,
    transactionId: normalizeTransactionId(chain.family, row.hash),
  };
}

export function mapBalanceChangeTransaction(row: BalanceChangeTransactionRow, chain: ChainConfig): TransactionContext {
  return {
    blockHeight: row.blockNumber,
    success: row.success,
    timestamp: row.timeStamp,
    transactionId: normalizeTransactionId(chain.family, row.hash),
  };
}

/**
 * Context for a transaction seen only in transfer rows. Nothing is known about
 * its destination, selector or status.
 */
export function synthesizeTransactionContext(
  transactionId: string,
  blockHeight: number,
  timestamp: number
): TransactionContext {
  return { blockHeight, timestamp, transactionId };
}

export interface TransferRowFields {
  from?: string | undefined;
  to?: string | undefined;
  value: bigint;
}

export function mapTransferRow(
  row: TransferRowFields,
  transactionId: string,
  assetId: string,
  kind: TransferKind,
  family: ChainFamily
): RawTransfer {
  return {
    amount: row.value,
    assetId,
    from: row.from ? normalizeAddress(family, row.from) : undefined,
    kind,
    to: row.to ? normalizeAddress(family, row.to) : undefined,
    transactionId,
  };
}

/**
 * Balance-change rows carry the native coin under the chain's sentinel mint or coin type
 */
export function balanceChangeKind(assetId: string, chain: ChainConfig): TransferKind {
  return assetId === chain.nativeAsset ? 'native' : 'token';
}

export function parseTokenDecimals(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const decimals = Number(value);
  return Number.isInteger(decimals) && decimals >= 0 ? decimals : undefined;
}

export function hasPlacement(row: BalanceChangeRow): row is BalanceChangeRow & { blockNumber: number; timeStamp: number } {
  return row.blockNumber !== undefined && row.timeStamp !== undefined;
}
