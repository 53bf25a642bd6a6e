import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  getCoinGeckoSettings,
  getCryptoCompareApiKey,
  getDataDirectory,
  getPricesDatabasePath,
  parseEnv,
  resetEnvCache,
} from '../config.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})).toEqual({
      SWAPTRACE_DATA_DIR: undefined,
      CRYPTOCOMPARE_API_KEY: undefined,
      COINGECKO_API_KEY: undefined,
      COINGECKO_USE_PRO_API: false,
      NODE_ENV: 'development',
    });
  });

  it('treats blank API keys as absent', () => {
    expect(parseEnv({ CRYPTOCOMPARE_API_KEY: '   ' }).CRYPTOCOMPARE_API_KEY).toBeUndefined();
  });

  it('reports invalid values', () => {
    expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow(/Environment validation failed:\n {2}- NODE_ENV:/);
  });
});

describe('cached accessors', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    resetEnvCache();
  });

  afterEach(() => {
    process.env = { ...saved };
    resetEnvCache();
  });

  it('defaults the data directory to ./data', () => {
    delete process.env['SWAPTRACE_DATA_DIR'];

    expect(getDataDirectory()).toBe(path.join(process.cwd(), 'data'));
  });

  it('reads the data directory and derives the prices database path', () => {
    process.env['SWAPTRACE_DATA_DIR'] = '/tmp/swaptrace-test';

    expect(getPricesDatabasePath()).toBe('/tmp/swaptrace-test/prices.db');
  });

  it('exposes provider credentials', () => {
    process.env['CRYPTOCOMPARE_API_KEY'] = 'test-secret';
    process.env['COINGECKO_API_KEY'] = 'test-secret-2';
    process.env['COINGECKO_USE_PRO_API'] = 'true';

    expect(getCryptoCompareApiKey()).toBe('test-secret');
    expect(getCoinGeckoSettings()).toEqual({ apiKey: 'test-secret-2', useProApi: true });
  });
});
