import type { RawTransfer, TransactionContext } from '@swaptrace/core';
import { MalformedInputError } from '@swaptrace/core';

import { normalizeAddress } from '../registry/chain-registry.js';

import {
  balanceChangeKind,
  hasPlacement,
  mapBalanceChangeTransaction,
  mapTransferRow,
  normalizeSuiCoinType,
  normalizeTransactionId,
  synthesizeTransactionContext,
} from './dump-mapper-utils.js';
import { BalanceChangeRowSchema, BalanceChangeTransactionRowSchema, type ExplorerDumpEnvelope } from './dump-schemas.js';
import { ExplorerDumpSource, type NormalizedDump } from './explorer-dump-source.js';

/**
 * Dumps built from per-transaction balance changes (Solana, Sui).
 *
 * Each row is one owner's change for one mint or coin type: a decrease has only
 * `from`, an increase only `to`. The native coin appears under the chain's
 * sentinel and becomes a `native` transfer.
 */
abstract class BalanceChangeDumpSource extends ExplorerDumpSource {
  protected normalize(envelope: ExplorerDumpEnvelope): NormalizedDump {
    const contexts = new Map<string, TransactionContext>();
    const transfers: RawTransfer[] = [];
    const family = this.config.family;

    envelope.normal_transactions.forEach((row, index) => {
      const tx = this.parseRow(BalanceChangeTransactionRowSchema, row, 'normal_transactions', index, 'transaction');
      if (!tx) return;

      const context = mapBalanceChangeTransaction(tx, this.config);
      if (!contexts.has(context.transactionId)) {
        contexts.set(context.transactionId, context);
      }
    });

    envelope.erc20_token_transfers.forEach((row, index) => {
      const change = this.parseRow(BalanceChangeRowSchema, row, 'erc20_token_transfers', index, 'transfer');
      if (!change) return;

      const transactionId = normalizeTransactionId(family, change.hash);
      if (!contexts.has(transactionId)) {
        if (!hasPlacement(change)) {
          this.reportMalformed(
            new MalformedInputError(`Balance change for unknown transaction ${transactionId} has no block or time`, 'transfer', {
              transactionId,
            })
          );
          return;
        }
        contexts.set(transactionId, synthesizeTransactionContext(transactionId, change.blockNumber, change.timeStamp));
      }

      const assetId = this.normalizeAssetId(change.contractAddress);
      transfers.push(mapTransferRow(change, transactionId, assetId, balanceChangeKind(assetId, this.config), family));
    });

    return { transactions: Array.from(contexts.values()), transfers };
  }

  protected normalizeAssetId(assetId: string): string {
    return normalizeAddress(this.config.family, assetId);
  }
}

/**
 * Solana balance changes keyed by mint; SOL is reported under the wrapped SOL mint
 */
export class SolanaDumpSource extends BalanceChangeDumpSource {}

/**
 * Sui balance changes keyed by coin type
 */
export class SuiDumpSource extends BalanceChangeDumpSource {
  protected override normalizeAssetId(assetId: string): string {
    return normalizeSuiCoinType(assetId, this.config);
  }
}
