import {
  CHAIN_REGISTRY,
  createExplorerDumpSource,
  readDumpFile,
  serializePricedTrade,
  serializeTrade,
  StaticTokenMetadataService,
  streamPricedTrades,
  streamTrades,
  SwapDetector,
  TradePricer,
  type TradeStreamParams,
} from '@swaptrace/ingestion';
import { getLogger } from '@swaptrace/logger';
import { createPriceServices, type PriceServices, type PriceServicesConfig } from '@swaptrace/price-providers';
import { err, ok, type Result } from 'neverthrow';

import { resolveSubjectAddress } from './trades-utils.js';

const logger = getLogger('TradesHandler');

export interface TradesParams {
  dumpFile: string;
  chain: string;
  address?: string | undefined;
  /** Attach USD quotes */
  prices: boolean;
  /** Price from the store and static tables only */
  offline: boolean;
  databasePath?: string | undefined;
}

export interface TradesSummary {
  chain: string;
  address: string;
  trades: number;
  /** Rows and records skipped as malformed */
  skipped: number;
}

export type PriceServicesOpener = (config: PriceServicesConfig) => Promise<Result<PriceServices, Error>>;

/**
 * Reads one explorer dump and writes its trades, one JSON line each.
 *
 * Lines already written stay valid when the batch fails part way.
 */
export class TradesHandler {
  constructor(private readonly openPriceServices: PriceServicesOpener = createPriceServices) {}

  async execute(params: TradesParams, writeLine: (line: string) => void): Promise<Result<TradesSummary, Error>> {
    const chainResult = CHAIN_REGISTRY.require(params.chain);
    if (chainResult.isErr()) {
      return err(chainResult.error);
    }
    const chain = chainResult.value;

    const dumpResult = await readDumpFile(params.dumpFile)();
    if (dumpResult.isErr()) {
      return err(dumpResult.error);
    }
    const dump = dumpResult.value;

    const addressResult = resolveSubjectAddress(params.address, dump);
    if (addressResult.isErr()) {
      return err(addressResult.error);
    }
    const address = addressResult.value;

    const summary: TradesSummary = { address, chain: chain.name, skipped: 0, trades: 0 };
    const countSkipped = () => {
      summary.skipped++;
    };

    const tokenMetadata = new StaticTokenMetadataService();
    const streamParams: TradeStreamParams = {
      address,
      chain: chain.name,
      detector: new SwapDetector(chain, { onMalformedInput: countSkipped }),
      source: createExplorerDumpSource(chain, () => Promise.resolve(ok(dump)), {
        onMalformedInput: countSkipped,
        tokenRegistrar: tokenMetadata,
      }),
    };

    if (!params.prices) {
      for await (const result of streamTrades(streamParams)) {
        if (result.isErr()) {
          return err(result.error);
        }
        writeLine(serializeTrade(result.value));
        summary.trades++;
      }
      return ok(summary);
    }

    const servicesResult = await this.openPriceServices({ databasePath: params.databasePath, offline: params.offline });
    if (servicesResult.isErr()) {
      return err(servicesResult.error);
    }
    const services = servicesResult.value;

    const pricer = new TradePricer({ resolver: services.resolver, tokenMetadata });
    try {
      for await (const result of streamPricedTrades({ ...streamParams, pricer })) {
        if (result.isErr()) {
          return err(result.error);
        }
        writeLine(serializePricedTrade(result.value));
        summary.trades++;
      }
      return ok(summary);
    } finally {
      const closeResult = await services.close();
      if (closeResult.isErr()) {
        logger.warn({ error: closeResult.error }, 'Failed to close price services');
      }
    }
  }
}
