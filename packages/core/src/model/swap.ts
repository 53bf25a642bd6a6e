/**
 * Normalized chain data consumed by swap detection, and the trades it produces.
 *
 * Raw amounts are integer base units (wei, lamports, MIST, token units) and
 * timestamps are unix seconds.
 */

export type TransferKind = 'token' | 'native' | 'internal';

/**
 * One observed movement of a fungible asset.
 */
export interface RawTransfer {
  readonly transactionId: string;
  /** Contract address, mint, coin type, or the chain's native sentinel */
  readonly assetId: string;
  /** Negative amounts are outbound regardless of sender/receiver */
  readonly amount: bigint;
  readonly from?: string | undefined;
  readonly to?: string | undefined;
  readonly kind: TransferKind;
}

export interface TransactionContext {
  readonly transactionId: string;
  /** Block number, slot or checkpoint */
  readonly blockHeight: number;
  readonly timestamp: number;
  readonly fromAddress?: string | undefined;
  /** Destination contract, used for router detection */
  readonly toAddress?: string | undefined;
  /** 4-byte call selector, `0x` + 8 lowercase hex */
  readonly selector?: string | undefined;
  readonly success?: boolean | undefined;
}

/**
 * How a transaction qualified as a swap
 */
export type SwapSignal = 'router-match' | 'selector-match' | 'transfer-pattern' | 'native-leg';

export const UNKNOWN_DEX = 'Unknown';

export interface Trade {
  readonly transactionId: string;
  readonly chain: string;
  readonly timestamp: number;
  readonly blockHeight: number;
  /** Asset sent by the subject */
  readonly assetIn: string;
  /** Asset received by the subject */
  readonly assetOut: string;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  readonly dex: string;
  readonly detectedBy: SwapSignal;
}
