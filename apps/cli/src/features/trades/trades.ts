import { UpstreamFetchError } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import type { Command } from 'commander';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { firstIssueMessage, TradesArgumentsSchema, TradesCommandOptionsSchema } from '../shared/schemas.js';

import { TradesHandler } from './trades-handler.js';

const logger = getLogger('TradesCommand');

/**
 * Register the trades command
 */
export function registerTradesCommand(program: Command): void {
  program
    .command('trades')
    .description('Detect DEX swaps in an explorer dump and write them as JSON lines')
    .argument('<dump-file>', 'Saved explorer dump (JSON)')
    .requiredOption('--chain <name>', 'Chain the dump was taken from (e.g. ethereum, solana)')
    .option('--address <address>', 'Wallet to analyse (defaults to the dump address)')
    .option('--no-prices', 'Skip USD pricing')
    .option('--offline', 'Price from the local store and static tables only')
    .option('--db <path>', 'Prices database path (defaults to <data dir>/prices.db)')
    .action(async (dumpFile: string, rawOptions: unknown) => {
      await executeTradesCommand(dumpFile, rawOptions);
    });
}

async function executeTradesCommand(dumpFile: string, rawOptions: unknown): Promise<void> {
  const output = new OutputManager();

  const argsResult = TradesArgumentsSchema.safeParse({ dumpFile });
  if (!argsResult.success) {
    output.error('trades', new Error(firstIssueMessage(argsResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }
  const optionsResult = TradesCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    output.error('trades', new Error(firstIssueMessage(optionsResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }
  const options = optionsResult.data;

  const handler = new TradesHandler();
  const result = await handler.execute(
    {
      address: options.address,
      chain: options.chain,
      databasePath: options.db,
      dumpFile: argsResult.data.dumpFile,
      offline: options.offline,
      prices: options.prices,
    },
    (line) => output.line(line)
  );

  if (result.isErr()) {
    const exitCode = result.error instanceof UpstreamFetchError ? ExitCodes.UPSTREAM_ERROR : ExitCodes.GENERAL_ERROR;
    output.error('trades', result.error, exitCode);
    return;
  }

  const summary = result.value;
  logger.info(
    `Wrote ${summary.trades} trades for ${summary.address} on ${summary.chain} (${summary.skipped} malformed records skipped)`
  );
}
