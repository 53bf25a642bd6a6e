import { getLogger } from '@swaptrace/logger';
import { createPriceServices } from '@swaptrace/price-providers';
import type { Command } from 'commander';

import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { AssetSymbolSchema, BackfillCommandOptionsSchema, firstIssueMessage } from '../shared/schemas.js';

import { BackfillHandler } from './backfill-handler.js';

const logger = getLogger('BackfillCommand');

/**
 * Register the backfill command
 */
export function registerBackfillCommand(program: Command): void {
  program
    .command('backfill')
    .description('Fetch the full hourly USD history of an asset into the prices database')
    .argument('<symbol>', 'Asset symbol (e.g. ETH, SOL)')
    .option('--db <path>', 'Prices database path (defaults to <data dir>/prices.db)')
    .action(async (symbol: string, rawOptions: unknown) => {
      await executeBackfillCommand(symbol, rawOptions);
    });
}

async function executeBackfillCommand(rawSymbol: string, rawOptions: unknown): Promise<void> {
  const output = new OutputManager();

  const symbolResult = AssetSymbolSchema.safeParse(rawSymbol);
  if (!symbolResult.success) {
    output.error('backfill', new Error(firstIssueMessage(symbolResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }
  const optionsResult = BackfillCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    output.error('backfill', new Error(firstIssueMessage(optionsResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const servicesResult = await createPriceServices({ coingecko: { enabled: false }, databasePath: optionsResult.data.db });
  if (servicesResult.isErr()) {
    output.error('backfill', servicesResult.error, ExitCodes.DATABASE_ERROR);
    return;
  }
  const services = servicesResult.value;

  const result = await new BackfillHandler(services).execute(symbolResult.data);

  const closeResult = await services.close();
  if (closeResult.isErr()) {
    logger.warn({ error: closeResult.error }, 'Failed to close price services');
  }

  if (result.isErr()) {
    output.error('backfill', result.error, ExitCodes.GENERAL_ERROR);
    return;
  }

  const { fetched, inserted, stored, symbol, updated } = result.value;
  output.json({ symbol, fetched, inserted, updated, stored });
}
