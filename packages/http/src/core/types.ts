import type { RateLimitConfig } from '../types.js';

/**
 * A sliding window limit (e.g. 30 requests per 60 000 ms)
 */
export interface RateLimitWindow {
  limit: number;
  windowMs: number;
}

/**
 * Rate limiter state (immutable). Token bucket plus sliding windows.
 */
export interface RateLimitState {
  burstLimit: number;
  lastRefill: number;
  requestTimestamps: readonly number[];
  requestsPerSecond: number;
  tokens: number;
  windows: readonly RateLimitWindow[];
}

export interface ErrorClassification {
  shouldRetry: boolean;
  type: 'rate_limit' | 'server' | 'client' | 'unknown';
}

export interface RateLimitHeaderInfo {
  delayMs?: number | undefined;
  source: string;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: typeof fetch;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}

const assertPositiveFinite = (fieldName: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid rate limit configuration: ${fieldName} must be a positive finite number, got ${value}`);
  }
};

export const createInitialRateLimitState = (config: RateLimitConfig): RateLimitState => {
  assertPositiveFinite('requestsPerSecond', config.requestsPerSecond);

  const windows: RateLimitWindow[] = [{ limit: Math.max(1, Math.ceil(config.requestsPerSecond)), windowMs: 1000 }];

  if (config.burstLimit !== undefined) {
    assertPositiveFinite('burstLimit', config.burstLimit);
  }
  if (config.requestsPerMinute !== undefined) {
    assertPositiveFinite('requestsPerMinute', config.requestsPerMinute);
    windows.push({ limit: config.requestsPerMinute, windowMs: 60_000 });
  }
  if (config.requestsPerHour !== undefined) {
    assertPositiveFinite('requestsPerHour', config.requestsPerHour);
    windows.push({ limit: config.requestsPerHour, windowMs: 3_600_000 });
  }

  const burstLimit = config.burstLimit ?? 1;

  return {
    burstLimit,
    lastRefill: 0, // set by effects.now() on first use
    requestTimestamps: [],
    requestsPerSecond: config.requestsPerSecond,
    tokens: burstLimit,
    windows,
  };
};
