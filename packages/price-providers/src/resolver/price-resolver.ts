import type { PricePoint, PriceQuote } from '@swaptrace/core';
import { isPriced, normalizeAssetSymbol, SECONDS_PER_DAY, unavailableQuote } from '@swaptrace/core';
import { getLogger } from '@swaptrace/logger';
import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { ExternalPriceService, HistoryClient, PriceStore } from '../core/types.js';

import { DEFAULT_STABLECOINS, DEFAULT_UNDERLYING_ASSETS, interpolatePrice, UnderlyingAssetLookup } from './resolver-utils.js';

const logger = getLogger('PriceResolver');

const MAX_DERIVATION_DEPTH = 1;

export interface PriceResolverOptions {
  /** Backfill each asset at most once per resolver (default true) */
  backfillOncePerAsset?: boolean | undefined;
  /** Largest gap between an external quote and the trade (default one day) */
  maxQuoteDistanceSeconds?: number | undefined;
  stablecoins?: readonly string[] | undefined;
  underlyingAssets?: Readonly<Record<string, string>> | undefined;
}

export interface PriceResolverDependencies {
  store: PriceStore;
  /** Omit to resolve from the store and fallbacks only */
  historyClient?: HistoryClient | undefined;
  externalService?: ExternalPriceService | undefined;
}

/**
 * Point-in-time USD price for an asset symbol.
 *
 * Lookup in the store, backfill the asset's history on a miss and look up once more,
 * then fall back to stablecoin parity, the external service and the underlying asset.
 * Unresolvable assets come back as an 'unavailable' quote; only store failures are errors.
 *
 * Store series and backfills are keyed by the normalized symbol. Quotes carry the
 * symbol as requested, and the underlying-asset patterns see it unchanged.
 */
export class PriceResolver {
  private readonly store: PriceStore;
  private readonly historyClient: HistoryClient | undefined;
  private readonly externalService: ExternalPriceService | undefined;
  private readonly backfillOncePerAsset: boolean;
  private readonly maxQuoteDistanceSeconds: number;
  private readonly stablecoins: ReadonlySet<string>;
  private readonly underlying: UnderlyingAssetLookup;

  private readonly inFlightBackfills = new Map<string, Promise<Result<boolean, Error>>>();
  private readonly backfilledAssets = new Set<string>();

  constructor(dependencies: PriceResolverDependencies, options: PriceResolverOptions = {}) {
    this.store = dependencies.store;
    this.historyClient = dependencies.historyClient;
    this.externalService = dependencies.externalService;
    this.backfillOncePerAsset = options.backfillOncePerAsset ?? true;
    this.maxQuoteDistanceSeconds = options.maxQuoteDistanceSeconds ?? SECONDS_PER_DAY;

    const stablecoins = options.stablecoins ?? DEFAULT_STABLECOINS;
    this.stablecoins = new Set(stablecoins.map((symbol) => symbol.toUpperCase()));
    this.underlying = new UnderlyingAssetLookup(options.underlyingAssets ?? DEFAULT_UNDERLYING_ASSETS, stablecoins);
  }

  resolve(assetSymbol: string, timestamp: number): Promise<Result<PriceQuote, Error>> {
    return this.resolveAtDepth(assetSymbol, timestamp, 0);
  }

  private async resolveAtDepth(
    assetSymbol: string,
    timestamp: number,
    depth: number
  ): Promise<Result<PriceQuote, Error>> {
    const storeSymbol = normalizeAssetSymbol(assetSymbol);
    const lookupResult = await this.lookup(assetSymbol, storeSymbol, timestamp);
    if (lookupResult.isErr()) {
      return err(lookupResult.error);
    }
    if (lookupResult.value) {
      return ok(lookupResult.value);
    }

    const backfillResult = await this.backfill(storeSymbol);
    if (backfillResult.isErr()) {
      return err(backfillResult.error);
    }

    if (backfillResult.value) {
      const retryResult = await this.lookup(assetSymbol, storeSymbol, timestamp);
      if (retryResult.isErr()) {
        return err(retryResult.error);
      }
      if (retryResult.value) {
        return ok(retryResult.value);
      }
      logger.debug(`No stored price for ${assetSymbol} at ${timestamp} after backfill`);
    }

    return this.fallback(assetSymbol, timestamp, depth);
  }

  /**
   * ok(undefined) when the bracketing points are not both stored
   */
  private async lookup(
    assetSymbol: string,
    storeSymbol: string,
    timestamp: number
  ): Promise<Result<PriceQuote | undefined, Error>> {
    const bracketResult = await this.store.getBracket(storeSymbol, timestamp);
    if (bracketResult.isErr()) {
      return err(bracketResult.error);
    }

    const { before, after } = bracketResult.value;
    if (!before) {
      return ok(undefined);
    }
    if (before.timestamp === timestamp) {
      return ok(this.storeQuote(assetSymbol, before, undefined, timestamp));
    }
    if (!after) {
      return ok(undefined);
    }
    return ok(this.storeQuote(assetSymbol, before, after, timestamp));
  }

  private storeQuote(
    assetSymbol: string,
    before: PricePoint,
    after: PricePoint | undefined,
    timestamp: number
  ): PriceQuote {
    return {
      assetSymbol,
      price: interpolatePrice(before, after, timestamp),
      provenance: 'store',
      timestamp,
    };
  }

  /**
   * ok(true) when a backfill ran (here or in a concurrent caller) and the lookup is worth retrying.
   * History failures are logged and become ok(false); store write failures are errors.
   */
  private backfill(assetSymbol: string): Promise<Result<boolean, Error>> {
    const inFlight = this.inFlightBackfills.get(assetSymbol);
    if (inFlight) {
      return inFlight;
    }

    if (!this.historyClient || (this.backfillOncePerAsset && this.backfilledAssets.has(assetSymbol))) {
      return Promise.resolve(ok(false));
    }

    const historyClient = this.historyClient;
    const promise = this.runBackfill(historyClient, assetSymbol).finally(() => {
      this.inFlightBackfills.delete(assetSymbol);
    });
    this.inFlightBackfills.set(assetSymbol, promise);
    return promise;
  }

  private async runBackfill(historyClient: HistoryClient, assetSymbol: string): Promise<Result<boolean, Error>> {
    this.backfilledAssets.add(assetSymbol);
    logger.info(`Backfilling hourly history for ${assetSymbol} from ${historyClient.name}`);

    const historyResult = await historyClient.fetchHistory(assetSymbol);
    if (historyResult.isErr()) {
      logger.warn(`Backfill failed for ${assetSymbol}: ${historyResult.error.message}`);
      return ok(false);
    }
    if (historyResult.value.length === 0) {
      logger.info(`No history available for ${assetSymbol} from ${historyClient.name}`);
      return ok(false);
    }

    const points: PricePoint[] = historyResult.value.map((point) => ({
      assetSymbol,
      price: point.open,
      source: historyClient.name,
      timestamp: point.timestamp,
    }));

    const upsertResult = await this.store.upsertBatch(points);
    if (upsertResult.isErr()) {
      return err(upsertResult.error);
    }

    logger.info(
      `Backfilled ${assetSymbol}: ${points.length} points (inserted ${upsertResult.value.inserted}, updated ${upsertResult.value.updated})`
    );
    return ok(true);
  }

  private async fallback(assetSymbol: string, timestamp: number, depth: number): Promise<Result<PriceQuote, Error>> {
    if (this.stablecoins.has(assetSymbol.toUpperCase())) {
      return ok({ assetSymbol, price: new Decimal(1), provenance: 'stablecoin', timestamp });
    }

    const externalQuote = await this.fromExternalService(assetSymbol, timestamp);
    if (externalQuote) {
      return ok(externalQuote);
    }

    if (depth < MAX_DERIVATION_DEPTH) {
      const underlyingSymbol = this.underlying.find(assetSymbol);
      if (underlyingSymbol !== undefined) {
        const underlyingResult = await this.resolveAtDepth(underlyingSymbol, timestamp, depth + 1);
        if (underlyingResult.isErr()) {
          return err(underlyingResult.error);
        }

        const underlyingQuote = underlyingResult.value;
        if (isPriced(underlyingQuote)) {
          logger.debug(`Priced ${assetSymbol} from underlying ${underlyingSymbol} (${underlyingQuote.provenance})`);
          return ok({
            assetSymbol,
            price: underlyingQuote.price,
            provenance: 'derived-ratio',
            sourceTimestamp: underlyingQuote.sourceTimestamp,
            timestamp,
          });
        }
      }
    }

    logger.debug(`No price for ${assetSymbol} at ${timestamp}`);
    return ok(unavailableQuote(assetSymbol, timestamp));
  }

  private async fromExternalService(assetSymbol: string, timestamp: number): Promise<PriceQuote | undefined> {
    if (!this.externalService) {
      return undefined;
    }

    const quoteResult = await this.externalService.fetchQuote(assetSymbol, timestamp);
    if (quoteResult.isErr()) {
      logger.warn(`${this.externalService.name} quote failed for ${assetSymbol}: ${quoteResult.error.message}`);
      return undefined;
    }

    const quote = quoteResult.value;
    if (!quote) {
      return undefined;
    }
    if (Math.abs(quote.timestamp - timestamp) > this.maxQuoteDistanceSeconds) {
      logger.debug(
        `Ignoring ${this.externalService.name} quote for ${assetSymbol}: ${quote.timestamp} is too far from ${timestamp}`
      );
      return undefined;
    }

    return {
      assetSymbol,
      price: quote.price,
      provenance: 'external-service',
      sourceTimestamp: quote.timestamp,
      timestamp,
    };
  }
}
