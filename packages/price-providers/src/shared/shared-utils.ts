import { parseDecimal } from '@swaptrace/core';
import { HttpClient } from '@swaptrace/http';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { ProviderRateLimitConfig } from '../core/types.js';

/**
 * Validate a raw price from an API response and convert it to a positive Decimal
 */
export function validateRawPrice(
  price: string | number | undefined,
  assetSymbol: string,
  context: string
): Result<Decimal, Error> {
  // Numbers go through their string form so Decimal sees the same digits JSON had
  const priceValue = typeof price === 'number' ? price.toString() : price;
  const decimal = parseDecimal(priceValue);

  if (!decimal.isFinite() || decimal.lessThanOrEqualTo(0)) {
    const reason = price === undefined ? 'not found' : `invalid (${price}, must be positive)`;
    return err(new Error(`${context} price for ${assetSymbol}: ${reason}`));
  }

  return ok(decimal);
}

export interface ProviderHttpClientConfig {
  apiKey?: string | undefined;
  /** Header carrying the API key */
  apiKeyHeader?: string | undefined;
  /** Prepended to the key in the header value, e.g. 'Apikey ' */
  apiKeyPrefix?: string | undefined;
  baseUrl: string;
  providerName: string;
  rateLimit: ProviderRateLimitConfig;
  retries?: number | undefined;
  timeout?: number | undefined;
}

/**
 * HttpClient with the provider's rate limit and optional API key header
 */
export function createProviderHttpClient(config: ProviderHttpClientConfig): HttpClient {
  const defaultHeaders: Record<string, string> = {};
  if (config.apiKey && config.apiKeyHeader) {
    defaultHeaders[config.apiKeyHeader] = `${config.apiKeyPrefix ?? ''}${config.apiKey}`;
  }

  return new HttpClient({
    baseUrl: config.baseUrl,
    defaultHeaders,
    providerName: config.providerName,
    rateLimit: config.rateLimit,
    retries: config.retries ?? 3,
    timeout: config.timeout ?? 15_000,
  });
}
