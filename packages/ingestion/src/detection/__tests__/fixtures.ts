import type { RawTransfer, TransactionContext } from '@swaptrace/core';

import { CHAIN_REGISTRY, type ChainConfig } from '../../registry/chain-registry.js';

export const SUBJECT = '0x1111111111111111111111111111111111111111';
export const POOL = '0x2222222222222222222222222222222222222222';
export const USDC = '0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48';
export const DAI = '0x6b175474e89094c44da98b954eedeac495271d0f';
export const WBTC = '0x2260fac5e5542a773aa44fbcfedf7c193bc2c599';
export const NATIVE = '0x0000000000000000000000000000000000000000';
export const UNISWAP_V2_ROUTER = '0x7a250d5630B4cF539739dF2C5dAcb4c659F2488D';

export function ethereumConfig(): ChainConfig {
  return CHAIN_REGISTRY.require('ethereum')._unsafeUnwrap();
}

export function context(transactionId: string, overrides: Partial<TransactionContext> = {}): TransactionContext {
  return {
    blockHeight: 100,
    fromAddress: SUBJECT,
    timestamp: 1_700_000_000,
    toAddress: '0x3333333333333333333333333333333333333333',
    transactionId,
    ...overrides,
  };
}

export function sent(transactionId: string, assetId: string, amount: bigint): RawTransfer {
  return { amount, assetId, from: SUBJECT, kind: 'token', to: POOL, transactionId };
}

export function received(transactionId: string, assetId: string, amount: bigint): RawTransfer {
  return { amount, assetId, from: POOL, kind: 'token', to: SUBJECT, transactionId };
}

export function nativeSent(transactionId: string, amount: bigint): RawTransfer {
  return { amount, assetId: NATIVE, from: SUBJECT, kind: 'native', to: POOL, transactionId };
}

export function internalReceived(transactionId: string, amount: bigint): RawTransfer {
  return { amount, assetId: NATIVE, from: POOL, kind: 'internal', to: SUBJECT, transactionId };
}
