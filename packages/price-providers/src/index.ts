export type {
  ExternalPriceService,
  ExternalQuote,
  HistoryClient,
  HistoryPoint,
  PriceBracket,
  PriceStore,
  ProviderRateLimitConfig,
  UpsertSummary,
} from './core/types.js';
export { PriceDataUnavailableError, type PriceDataUnavailableReason } from './core/errors.js';

export {
  closePricesDatabase,
  createPricesDatabase,
  initializePricesDatabase,
  openPricesDatabase,
  type PricesDB,
} from './persistence/database.js';
export type { PricesDatabase, PricePointsTable } from './persistence/schema.js';
export { PriceRepository } from './persistence/repositories/price-repository.js';

export {
  CryptoCompareHistoryClient,
  createCryptoCompareHistoryClient,
  type CryptoCompareHistoryClientConfig,
  type CryptoCompareHistoryOptions,
} from './providers/cryptocompare/history-client.js';
export {
  CoinGeckoPriceService,
  createCoinGeckoPriceService,
  type CoinGeckoPriceServiceConfig,
} from './providers/coingecko/price-service.js';

export {
  PriceResolver,
  type PriceResolverDependencies,
  type PriceResolverOptions,
} from './resolver/price-resolver.js';
export { interpolatePrice, UnderlyingAssetLookup } from './resolver/resolver-utils.js';

export { createPriceServices, type PriceServices, type PriceServicesConfig } from './shared/factory.js';
