import { readFile } from 'node:fs/promises';

import { wrapError } from '@swaptrace/core';
import { ok, type Result } from 'neverthrow';

import type { ChainConfig } from '../registry/chain-registry.js';

import { SolanaDumpSource, SuiDumpSource } from './balance-change-dump-source.js';
import { EvmDumpSource } from './evm-dump-source.js';
import type { DumpLoader, ExplorerDumpSource, ExplorerDumpSourceOptions } from './explorer-dump-source.js';

/**
 * Loader reading a dump saved as a JSON file
 */
export function readDumpFile(filePath: string): DumpLoader {
  return async (): Promise<Result<unknown, Error>> => {
    try {
      const content = await readFile(filePath, 'utf8');
      const parsed: unknown = JSON.parse(content);
      return ok(parsed);
    } catch (error) {
      return wrapError(error, `Failed to read explorer dump ${filePath}`);
    }
  };
}

/**
 * Source variant for the chain's family
 */
export function createExplorerDumpSource(
  chain: ChainConfig,
  loadDump: DumpLoader,
  options: ExplorerDumpSourceOptions = {}
): ExplorerDumpSource {
  switch (chain.family) {
    case 'evm':
      return new EvmDumpSource(chain, loadDump, options);
    case 'solana':
      return new SolanaDumpSource(chain, loadDump, options);
    case 'sui':
      return new SuiDumpSource(chain, loadDump, options);
  }
}
