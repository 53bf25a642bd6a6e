/**
 * Wires the prices database, remote clients and resolver together
 */

import { getErrorMessage } from '@swaptrace/core';
import { getPricesDatabasePath } from '@swaptrace/env';
import { getLogger } from '@swaptrace/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { ExternalPriceService, HistoryClient } from '../core/types.js';
import { closePricesDatabase, openPricesDatabase, type PricesDB } from '../persistence/database.js';
import { PriceRepository } from '../persistence/repositories/price-repository.js';
import { createCoinGeckoPriceService, type CoinGeckoPriceServiceConfig } from '../providers/coingecko/price-service.js';
import {
  createCryptoCompareHistoryClient,
  type CryptoCompareHistoryClientConfig,
} from '../providers/cryptocompare/history-client.js';
import { PriceResolver, type PriceResolverOptions } from '../resolver/price-resolver.js';

const logger = getLogger('PriceServicesFactory');

export interface PriceServicesConfig {
  /** Defaults to <data dir>/prices.db */
  databasePath?: string | undefined;
  /** Store and static fallbacks only; no remote clients are created */
  offline?: boolean | undefined;
  coingecko?: (CoinGeckoPriceServiceConfig & { enabled?: boolean | undefined }) | undefined;
  cryptocompare?: (CryptoCompareHistoryClientConfig & { enabled?: boolean | undefined }) | undefined;
  resolver?: PriceResolverOptions | undefined;
}

export interface PriceServices {
  db: PricesDB;
  store: PriceRepository;
  resolver: PriceResolver;
  historyClient: HistoryClient | undefined;
  externalService: ExternalPriceService | undefined;
  /** Closes remote clients, then the database */
  close(): Promise<Result<void, Error>>;
}

export async function createPriceServices(config: PriceServicesConfig = {}): Promise<Result<PriceServices, Error>> {
  const databasePath = config.databasePath ?? getPricesDatabasePath();
  const dbResult = await openPricesDatabase(databasePath);
  if (dbResult.isErr()) {
    return err(new Error(`Failed to open prices database: ${dbResult.error.message}`));
  }
  const db = dbResult.value;
  logger.debug(`Prices database ready at ${databasePath}`);

  const online = !config.offline;
  const historyClient =
    online && config.cryptocompare?.enabled !== false
      ? createCryptoCompareHistoryClient(config.cryptocompare)
      : undefined;
  const externalService =
    online && config.coingecko?.enabled !== false ? createCoinGeckoPriceService(config.coingecko) : undefined;

  const store = new PriceRepository(db);
  const resolver = new PriceResolver({ externalService, historyClient, store }, config.resolver);

  const close = async (): Promise<Result<void, Error>> => {
    const failures: string[] = [];
    for (const client of [historyClient, externalService]) {
      if (!client) continue;
      try {
        await client.close();
      } catch (error) {
        failures.push(`${client.name}: ${getErrorMessage(error)}`);
      }
    }

    const dbClose = await closePricesDatabase(db);
    if (dbClose.isErr()) {
      failures.push(dbClose.error.message);
    }

    return failures.length === 0 ? ok() : err(new Error(`Failed to close price services: ${failures.join('; ')}`));
  };

  return ok({ close, db, externalService, historyClient, resolver, store });
}
