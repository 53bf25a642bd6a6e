export {
  getCoinGeckoSettings,
  getCryptoCompareApiKey,
  getDataDirectory,
  getPricesDatabasePath,
  parseEnv,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
