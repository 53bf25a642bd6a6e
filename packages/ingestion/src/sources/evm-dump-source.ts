import type { RawTransfer, TransactionContext } from '@swaptrace/core';

import { normalizeAddress } from '../registry/chain-registry.js';

import {
  mapEvmNormalTransaction,
  mapTransferRow,
  normalizeTransactionId,
  parseTokenDecimals,
  synthesizeTransactionContext,
} from './dump-mapper-utils.js';
import {
  EvmInternalTransactionRowSchema,
  EvmNormalTransactionRowSchema,
  EvmTokenTransferRowSchema,
  type EvmTokenTransferRow,
  type ExplorerDumpEnvelope,
} from './dump-schemas.js';
import { ExplorerDumpSource, type NormalizedDump } from './explorer-dump-source.js';

/**
 * Etherscan-style dump: normal transactions, ERC-20 transfers and internal transactions.
 *
 * - `value` on a normal transaction becomes a native transfer
 * - successful internal transactions become `internal` transfers of the native asset
 * - ERC-20 rows become token transfers, and their symbol/decimals are registered
 * - transactions seen only in transfer rows get a context from the row's block and time
 */
export class EvmDumpSource extends ExplorerDumpSource {
  protected normalize(envelope: ExplorerDumpEnvelope): NormalizedDump {
    const contexts = new Map<string, TransactionContext>();
    const transfers: RawTransfer[] = [];
    const family = this.config.family;

    envelope.normal_transactions.forEach((row, index) => {
      const tx = this.parseRow(EvmNormalTransactionRowSchema, row, 'normal_transactions', index, 'transaction');
      if (!tx) return;

      const context = mapEvmNormalTransaction(tx, this.config);
      if (contexts.has(context.transactionId)) {
        this.logger.debug(`Duplicate normal transaction ${context.transactionId}`);
        return;
      }
      contexts.set(context.transactionId, context);

      if (tx.value > 0n) {
        transfers.push(mapTransferRow(tx, context.transactionId, this.config.nativeAsset, 'native', family));
      }
    });

    envelope.internal_transactions.forEach((row, index) => {
      const internal = this.parseRow(EvmInternalTransactionRowSchema, row, 'internal_transactions', index, 'transfer');
      if (!internal || internal.isError === '1' || internal.value === 0n) return;

      const transactionId = normalizeTransactionId(family, internal.hash);
      if (!contexts.has(transactionId)) {
        contexts.set(transactionId, synthesizeTransactionContext(transactionId, internal.blockNumber, internal.timeStamp));
      }
      transfers.push(mapTransferRow(internal, transactionId, this.config.nativeAsset, 'internal', family));
    });

    envelope.erc20_token_transfers.forEach((row, index) => {
      const token = this.parseRow(EvmTokenTransferRowSchema, row, 'erc20_token_transfers', index, 'transfer');
      if (!token) return;

      const transactionId = normalizeTransactionId(family, token.hash);
      if (!contexts.has(transactionId)) {
        contexts.set(transactionId, synthesizeTransactionContext(transactionId, token.blockNumber, token.timeStamp));
      }

      const assetId = normalizeAddress(family, token.contractAddress);
      this.registerToken(assetId, token);
      transfers.push(mapTransferRow(token, transactionId, assetId, 'token', family));
    });

    return { transactions: Array.from(contexts.values()), transfers };
  }

  private registerToken(assetId: string, row: EvmTokenTransferRow): void {
    if (!this.tokenRegistrar || !row.tokenSymbol) return;

    const accepted = this.tokenRegistrar.register(this.config.name, assetId, {
      decimals: parseTokenDecimals(row.tokenDecimal),
      symbol: row.tokenSymbol,
    });
    if (!accepted) {
      this.logger.debug(`Ignored token metadata for ${assetId}`);
    }
  }
}
