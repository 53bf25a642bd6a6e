import { describe, expect, it } from 'vitest';

import {
  classifyTransaction,
  matchNativeLeg,
  matchRouter,
  matchSelector,
  matchTransferPattern,
  type ClassificationInput,
} from '../classification.js';
import type { TransferFlows } from '../detector-utils.js';

import { context, DAI, ethereumConfig, UNISWAP_V2_ROUTER, USDC } from './fixtures.js';

const chain = ethereumConfig();

const NO_FLOWS: TransferFlows = { nativeDelta: 0n, received: [], sent: [] };

function input(overrides: Partial<ClassificationInput> = {}): ClassificationInput {
  return { chain, context: context('0x1'), flows: NO_FLOWS, ...overrides };
}

describe('matchRouter', () => {
  it('matches known routers regardless of address case', () => {
    expect(matchRouter(input({ context: context('0x1', { toAddress: UNISWAP_V2_ROUTER }) }))).toEqual({
      dex: 'Uniswap V2',
      kind: 'router-match',
    });
  });

  it('does not match unknown or missing destinations', () => {
    expect(matchRouter(input()).kind).toBe('no-match');
    expect(matchRouter(input({ context: context('0x1', { toAddress: undefined }) })).kind).toBe('no-match');
  });
});

describe('matchSelector', () => {
  it('matches swap selectors case-insensitively', () => {
    expect(matchSelector(input({ context: context('0x1', { selector: '0x38ED1739' }) }))).toEqual({
      kind: 'selector-match',
      selector: '0x38ed1739',
    });
  });

  it('ignores other selectors', () => {
    expect(matchSelector(input({ context: context('0x1', { selector: '0xa9059cbb' }) })).kind).toBe('no-match');
  });
});

describe('matchTransferPattern', () => {
  it('requires a distinct sent and received asset', () => {
    const swap: TransferFlows = { nativeDelta: 0n, received: [{ amount: 1n, assetId: DAI }], sent: [{ amount: 1n, assetId: USDC }] };
    const refund: TransferFlows = { nativeDelta: 0n, received: [{ amount: 1n, assetId: USDC }], sent: [{ amount: 2n, assetId: USDC }] };

    expect(matchTransferPattern(input({ flows: swap })).kind).toBe('transfer-pattern');
    expect(matchTransferPattern(input({ flows: refund })).kind).toBe('no-match');
  });
});

describe('matchNativeLeg', () => {
  it('matches one token out with native in', () => {
    const flows: TransferFlows = { nativeDelta: 5n, received: [], sent: [{ amount: 10n, assetId: USDC }] };
    expect(matchNativeLeg(input({ flows })).kind).toBe('native-leg');
  });

  it('allows a refund of the same token on the token-to-native side', () => {
    const flows: TransferFlows = {
      nativeDelta: 5n,
      received: [{ amount: 1n, assetId: USDC }],
      sent: [{ amount: 10n, assetId: USDC }],
    };
    expect(matchNativeLeg(input({ flows })).kind).toBe('native-leg');
  });

  it('matches native out with tokens in', () => {
    const flows: TransferFlows = { nativeDelta: -5n, received: [{ amount: 10n, assetId: DAI }], sent: [] };
    expect(matchNativeLeg(input({ flows })).kind).toBe('native-leg');
  });

  it('does not match when the native delta has the wrong sign', () => {
    const flows: TransferFlows = { nativeDelta: -5n, received: [], sent: [{ amount: 10n, assetId: USDC }] };
    expect(matchNativeLeg(input({ flows })).kind).toBe('no-match');
  });

  it('does not match two outbound tokens', () => {
    const flows: TransferFlows = {
      nativeDelta: 5n,
      received: [],
      sent: [
        { amount: 10n, assetId: USDC },
        { amount: 10n, assetId: DAI },
      ],
    };
    expect(matchNativeLeg(input({ flows })).kind).toBe('no-match');
  });
});

describe('classifyTransaction', () => {
  it('applies strategies in precedence order', () => {
    const flows: TransferFlows = { nativeDelta: 0n, received: [{ amount: 1n, assetId: DAI }], sent: [{ amount: 1n, assetId: USDC }] };
    const routed = context('0x1', { selector: '0x38ed1739', toAddress: UNISWAP_V2_ROUTER });

    expect(classifyTransaction(input({ context: routed, flows })).kind).toBe('router-match');
    expect(classifyTransaction(input({ context: context('0x1', { selector: '0x38ed1739' }), flows })).kind).toBe(
      'selector-match'
    );
    expect(classifyTransaction(input({ flows })).kind).toBe('transfer-pattern');
  });

  it('returns no-match when nothing applies', () => {
    expect(classifyTransaction(input())).toEqual({ kind: 'no-match' });
  });

  it('uses injected predicates', () => {
    expect(classifyTransaction(input(), [() => ({ kind: 'native-leg' })])).toEqual({ kind: 'native-leg' });
  });
});
