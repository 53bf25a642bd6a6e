#!/usr/bin/env node
import { getErrorMessage } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import { Command } from 'commander';

import { registerBackfillCommand } from './features/backfill/backfill.js';
import { applyVerbosity, type GlobalOptions } from './features/shared/verbosity.js';
import { registerTradesCommand } from './features/trades/trades.js';

const logger = getLogger('CLI');
const program = new Command();

async function main(): Promise<void> {
  program
    .name('swaptrace')
    .description('Extract DEX swaps from wallet histories and price them in USD')
    .version('0.1.0')
    .option('--verbose', 'Log debug output to stderr')
    .hook('preAction', (command) => {
      applyVerbosity(command.opts<GlobalOptions>());
    });

  registerTradesCommand(program);
  registerBackfillCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error({ error }, `CLI failed: ${getErrorMessage(error)}`);
  process.exit(1);
});
