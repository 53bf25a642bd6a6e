// Chains
export {
  CHAIN_FAMILIES,
  CHAIN_REGISTRY,
  ChainRegistry,
  ChainsFileSchema,
  getAllChainNames,
  getChainConfig,
  isChainSupported,
  normalizeAddress,
  type ChainConfig,
  type ChainFamily,
  type ChainsFile,
} from './registry/chain-registry.js';

// Detection
export { groupTransfersByTransaction, type GroupingStats } from './grouping/transfer-grouper.js';
export {
  classifyTransaction,
  matchNativeLeg,
  matchRouter,
  matchSelector,
  matchTransferPattern,
  SWAP_PREDICATES,
  type SwapClassification,
  type SwapMatch,
  type SwapPredicate,
} from './detection/classification.js';
export {
  SwapDetector,
  type DetectTradesInput,
  type SwapDetectorOptions,
} from './detection/swap-detector.js';

// Token metadata
export {
  DEFAULT_KNOWN_TOKENS,
  StaticTokenMetadataService,
  type KnownTokens,
  type TokenInfo,
  type TokenMetadataService,
} from './token-metadata/token-metadata-service.js';

// Transaction sources
export {
  ExplorerDumpSource,
  type ChainTransactionSource,
  type DumpLoader,
  type ExplorerDumpSourceOptions,
  type TokenRegistrar,
} from './sources/explorer-dump-source.js';
export { EvmDumpSource } from './sources/evm-dump-source.js';
export { SolanaDumpSource, SuiDumpSource } from './sources/balance-change-dump-source.js';
export { createExplorerDumpSource, readDumpFile } from './sources/dump-loader.js';

// Pricing and output
export { TradePricer, type QuoteResolver, type TradePricerDependencies } from './pricing/trade-pricer.js';
export {
  streamPricedTrades,
  streamTrades,
  type PricedTradeStreamParams,
  type TradeStreamParams,
} from './pipeline/priced-trade-stream.js';
export {
  pricedTradeToJson,
  serializePricedTrade,
  serializeTrade,
  tradeToJson,
  type PricedTradeJson,
  type QuoteJson,
  type TradeJson,
} from './pipeline/trade-serialization.js';
