import type { RawTransfer } from '@swaptrace/core';

export interface GroupingStats {
  /** Transfers dropped because they carry no transaction id */
  skipped: number;
}

/**
 * Groups raw transfers by transaction id.
 *
 * Keys keep first-seen order, and transfers keep input order within a group, so
 * first-seen tie-breaking downstream is stable. Transfers without an id are
 * skipped and counted in `stats` when given.
 */
export function groupTransfersByTransaction(
  transfers: Iterable<RawTransfer>,
  stats?: GroupingStats
): Map<string, RawTransfer[]> {
  const groups = new Map<string, RawTransfer[]>();

  for (const transfer of transfers) {
    if (!transfer.transactionId) {
      if (stats) stats.skipped += 1;
      continue;
    }

    const group = groups.get(transfer.transactionId);
    if (group) {
      group.push(transfer);
    } else {
      groups.set(transfer.transactionId, [transfer]);
    }
  }

  return groups;
}
