import type { SwapSignal, TransactionContext } from '@swaptrace/core';

import { normalizeAddress, type ChainConfig } from '../registry/chain-registry.js';

import type { TransferFlows } from './detector-utils.js';

export type SwapClassification =
  | { kind: 'router-match'; dex: string }
  | { kind: 'selector-match'; selector: string }
  | { kind: 'transfer-pattern' }
  | { kind: 'native-leg' }
  | { kind: 'no-match' };

export type SwapMatch = Exclude<SwapClassification, { kind: 'no-match' }>;

export interface ClassificationInput {
  chain: ChainConfig;
  context: TransactionContext;
  flows: TransferFlows;
}

export type SwapPredicate = (input: ClassificationInput) => SwapClassification;

const NO_MATCH: SwapClassification = { kind: 'no-match' };

/**
 * The transaction was sent to one of the chain's known DEX routers
 */
export const matchRouter: SwapPredicate = ({ chain, context }) => {
  if (!context.toAddress) return NO_MATCH;
  const dex = chain.routers.get(normalizeAddress(chain.family, context.toAddress));
  return dex ? { dex, kind: 'router-match' } : NO_MATCH;
};

/**
 * The call selector is one of the chain's swap functions
 */
export const matchSelector: SwapPredicate = ({ chain, context }) => {
  if (!context.selector) return NO_MATCH;
  const selector = context.selector.toLowerCase();
  return chain.swapSelectors.has(selector) ? { kind: 'selector-match', selector } : NO_MATCH;
};

/**
 * The subject both sent and received token assets, and at least one pair differs
 */
export const matchTransferPattern: SwapPredicate = ({ flows }) => {
  const distinctPair = flows.sent.some((sent) => flows.received.some((received) => received.assetId !== sent.assetId));
  return distinctPair ? { kind: 'transfer-pattern' } : NO_MATCH;
};

/**
 * Token to native (one token out, native in) or native to token (native out, tokens in)
 */
export const matchNativeLeg: SwapPredicate = ({ flows }) => {
  const { nativeDelta, received, sent } = flows;

  const [onlySent] = sent;
  if (sent.length === 1 && onlySent && nativeDelta > 0n) {
    const receivedOther = received.some((flow) => flow.assetId !== onlySent.assetId);
    if (!receivedOther) return { kind: 'native-leg' };
  }

  if (sent.length === 0 && received.length > 0 && nativeDelta < 0n) {
    return { kind: 'native-leg' };
  }

  return NO_MATCH;
};

/**
 * Strategies in precedence order. The first match tags the transaction.
 */
export const SWAP_PREDICATES: readonly SwapPredicate[] = [
  matchRouter,
  matchSelector,
  matchTransferPattern,
  matchNativeLeg,
];

export function classifyTransaction(
  input: ClassificationInput,
  predicates: readonly SwapPredicate[] = SWAP_PREDICATES
): SwapClassification {
  for (const predicate of predicates) {
    const classification = predicate(input);
    if (classification.kind !== 'no-match') {
      return classification;
    }
  }
  return NO_MATCH;
}

export function toSwapSignal(match: SwapMatch): SwapSignal {
  return match.kind;
}
