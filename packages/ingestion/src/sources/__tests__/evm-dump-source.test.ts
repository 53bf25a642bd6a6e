import type { MalformedInputError } from '@swaptrace/core';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { CHAIN_REGISTRY } from '../../registry/chain-registry.js';
import { EvmDumpSource } from '../evm-dump-source.js';
import type { DumpLoader, TokenRegistrar } from '../explorer-dump-source.js';

const chain = CHAIN_REGISTRY.require('ethereum')._unsafeUnwrap();

const SUBJECT = '0xabc0000000000000000000000000000000000001';
const ROUTER = '0x7a250d5630B4cF539739dF2C5dAcb4c659F2488D';
const ROUTER_LOWER = ROUTER.toLowerCase();
const USDC = '0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48';
const DAI = '0x6b175474e89094c44da98b954eedeac495271d0f';

const DUMP = {
  address: '0xAbC0000000000000000000000000000000000001',
  erc20_token_transfers: [
    {
      blockNumber: '100',
      contractAddress: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
      from: ROUTER,
      hash: '0xAAA1',
      timeStamp: '1700000000',
      to: SUBJECT,
      tokenDecimal: '6',
      tokenSymbol: 'USDC',
      value: '3000000',
    },
    {
      blockNumber: '102',
      contractAddress: '0x6B175474E89094C44Da98b954EedeAC495271d0F',
      from: SUBJECT,
      hash: '0xCCC3',
      timeStamp: '1700000200',
      to: ROUTER,
      tokenDecimal: '18',
      tokenSymbol: 'DAI',
      value: '250',
    },
    {
      blockNumber: '103',
      contractAddress: USDC,
      from: SUBJECT,
      hash: '0xDDD4',
      timeStamp: '1700000300',
      to: ROUTER,
      value: '1.5',
    },
  ],
  internal_transactions: [
    { blockNumber: '102', from: ROUTER, hash: '0xCCC3', isError: '0', timeStamp: '1700000200', to: SUBJECT, value: '500' },
    { blockNumber: '100', from: ROUTER, hash: '0xAAA1', isError: '1', timeStamp: '1700000000', to: SUBJECT, value: '7' },
  ],
  normal_transactions: [
    {
      blockNumber: '100',
      from: SUBJECT,
      hash: '0xAAA1',
      input: '0x7ff36ab50000000000000000000000000000000000000000000000000000000000000001',
      isError: '0',
      timeStamp: '1700000000',
      to: ROUTER,
      value: '1000000000000000000',
    },
    {
      blockNumber: '101',
      from: SUBJECT,
      hash: '0xBBB2',
      input: '0x38ed1739abcdef',
      isError: '1',
      timeStamp: '1700000100',
      to: ROUTER,
      value: '0',
    },
    { blockNumber: '101', from: SUBJECT, hash: '', timeStamp: '1700000100', to: ROUTER, value: '0' },
  ],
};

function loaderFor(dump: unknown): DumpLoader {
  return vi.fn(() => Promise.resolve(ok(dump)));
}

describe('EvmDumpSource', () => {
  it('maps normal transactions to contexts and synthesizes the rest', async () => {
    const source = new EvmDumpSource(chain, loaderFor(DUMP));

    const transactions = (await source.fetchTransactions(SUBJECT))._unsafeUnwrap();

    expect(transactions).toEqual([
      {
        blockHeight: 100,
        fromAddress: SUBJECT,
        selector: '0x7ff36ab5',
        success: true,
        timestamp: 1700000000,
        toAddress: ROUTER_LOWER,
        transactionId: '0xaaa1',
      },
      {
        blockHeight: 101,
        fromAddress: SUBJECT,
        selector: '0x38ed1739',
        success: false,
        timestamp: 1700000100,
        toAddress: ROUTER_LOWER,
        transactionId: '0xbbb2',
      },
      { blockHeight: 102, timestamp: 1700000200, transactionId: '0xccc3' },
    ]);
  });

  it('maps value, internal and token rows to transfers', async () => {
    const source = new EvmDumpSource(chain, loaderFor(DUMP));

    const transfers = (await source.fetchTransfers(SUBJECT))._unsafeUnwrap();

    expect(transfers).toEqual([
      {
        amount: 1000000000000000000n,
        assetId: chain.nativeAsset,
        from: SUBJECT,
        kind: 'native',
        to: ROUTER_LOWER,
        transactionId: '0xaaa1',
      },
      { amount: 500n, assetId: chain.nativeAsset, from: ROUTER_LOWER, kind: 'internal', to: SUBJECT, transactionId: '0xccc3' },
      { amount: 3000000n, assetId: USDC, from: ROUTER_LOWER, kind: 'token', to: SUBJECT, transactionId: '0xaaa1' },
      { amount: 250n, assetId: DAI, from: SUBJECT, kind: 'token', to: ROUTER_LOWER, transactionId: '0xccc3' },
    ]);
  });

  it('skips and reports malformed rows', async () => {
    const reported: MalformedInputError[] = [];
    const source = new EvmDumpSource(chain, loaderFor(DUMP), { onMalformedInput: (error) => reported.push(error) });

    await source.fetchTransfers(SUBJECT);

    expect(reported.map((error) => error.message)).toEqual([
      'Invalid normal_transactions row 2: hash: Hash must not be empty',
      'Invalid erc20_token_transfers row 2: value: Amount must be an integer, got 1.5',
    ]);
    expect(reported.map((error) => error.record)).toEqual(['transaction', 'transfer']);
  });

  it('registers token metadata found in token rows', async () => {
    const register = vi.fn(() => true);
    const registrar: TokenRegistrar = { register };
    const source = new EvmDumpSource(chain, loaderFor(DUMP), { tokenRegistrar: registrar });

    await source.fetchTransfers(SUBJECT);

    expect(register.mock.calls).toEqual([
      ['ethereum', USDC, { decimals: 6, symbol: 'USDC' }],
      ['ethereum', DAI, { decimals: 18, symbol: 'DAI' }],
    ]);
  });

  it('loads the dump once for both fetches', async () => {
    const loader = loaderFor(DUMP);
    const source = new EvmDumpSource(chain, loader);

    await source.fetchTransactions(SUBJECT);
    await source.fetchTransfers(SUBJECT.toUpperCase().replace('0X', '0x'));

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('rejects a dump for another address', async () => {
    const source = new EvmDumpSource(chain, loaderFor(DUMP));

    const result = await source.fetchTransactions('0x9990000000000000000000000000000000000009');

    expect(result._unsafeUnwrapErr().message).toBe(
      'Explorer dump is for 0xAbC0000000000000000000000000000000000001, not 0x9990000000000000000000000000000000000009'
    );
  });

  it('rejects a dump whose envelope is invalid', async () => {
    const source = new EvmDumpSource(chain, loaderFor({ normal_transactions: [] }));

    const result = await source.fetchTransactions(SUBJECT);

    expect(result._unsafeUnwrapErr().message).toBe('Invalid ethereum explorer dump: address: Required');
  });

  it('passes loader failures through', async () => {
    const source = new EvmDumpSource(chain, () => Promise.resolve(err(new Error('disk on fire'))));

    const result = await source.fetchTransfers(SUBJECT);

    expect(result._unsafeUnwrapErr().message).toBe('disk on fire');
  });

  it('reports its chain', () => {
    expect(new EvmDumpSource(chain, loaderFor(DUMP)).chain).toBe('ethereum');
  });
});
