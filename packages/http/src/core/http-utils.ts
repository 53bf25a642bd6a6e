// Pure HTTP utility functions

import type { ErrorClassification, RateLimitHeaderInfo } from './types.js';

const MAX_HEADER_DELAY_MS = 30_000;

/**
 * Build URL from base URL, endpoint and optional query parameters
 */
export const buildUrl = (
  baseUrl: string,
  endpoint: string,
  query?: Record<string, string | number | undefined>
): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  let url = cleanBaseUrl;
  if (endpoint && endpoint !== '/') {
    url += endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  }

  const queryString = buildQueryString(query);
  if (!queryString) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${queryString}`;
};

export const buildQueryString = (query?: Record<string, string | number | undefined>): string => {
  if (!query) return '';
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  return params.toString();
};

/**
 * Sanitize URL for logging (redact sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'x_cg_demo_api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Classify an HTTP status for retry logic. Gateway-type 5xx responses are
 * transient and retried; other 5xx and all 4xx except 429 are not.
 */
export const classifyHttpError = (status: number): ErrorClassification => {
  if (status === 429) {
    return { shouldRetry: true, type: 'rate_limit' };
  }

  if (status >= 500 && status < 600) {
    return { shouldRetry: status === 502 || status === 503 || status === 504, type: 'server' };
  }

  if (status >= 400 && status < 500) {
    return { shouldRetry: false, type: 'client' };
  }

  return { shouldRetry: true, type: 'unknown' };
};

/**
 * Parse Retry-After header value (delay-seconds or HTTP-date)
 */
export const parseRetryAfter = (value: string, currentTime: number): number | undefined => {
  if (/^\d+$/.test(value.trim())) {
    const seconds = parseInt(value, 10);
    // 0 is not a usable delay; use the minimum
    return seconds === 0 ? 1000 : Math.min(seconds * 1000, MAX_HEADER_DELAY_MS);
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - currentTime;
    if (delayMs > 0) {
      return Math.min(delayMs, MAX_HEADER_DELAY_MS);
    }
  }

  return undefined;
};

/**
 * Delay until a unix timestamp (seconds) is reached, capped
 */
export const parseUnixTimestamp = (value: string, currentTime: number): number | undefined => {
  const timestamp = parseInt(value, 10);
  if (isNaN(timestamp) || timestamp <= 0) {
    return undefined;
  }

  const delaySeconds = timestamp - Math.floor(currentTime / 1000);
  return delaySeconds > 0 ? Math.min(delaySeconds * 1000, MAX_HEADER_DELAY_MS) : undefined;
};

/**
 * Determine retry delay from rate limit headers. Order of preference:
 * Retry-After, X-RateLimit-Reset (unix seconds), RateLimit-Reset (delta seconds).
 * Header names are expected lowercase (as produced by Headers.entries()).
 */
export const parseRateLimitHeaders = (headers: Record<string, string>, currentTime: number): RateLimitHeaderInfo => {
  const retryAfter = headers['retry-after'];
  if (retryAfter) {
    const delayMs = parseRetryAfter(retryAfter, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'Retry-After' };
    }
  }

  const xRateLimitReset = headers['x-ratelimit-reset'];
  if (xRateLimitReset) {
    const delayMs = parseUnixTimestamp(xRateLimitReset, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: 'X-RateLimit-Reset' };
    }
  }

  const rateLimitReset = headers['ratelimit-reset'];
  if (rateLimitReset) {
    const seconds = parseInt(rateLimitReset, 10);
    if (!isNaN(seconds) && seconds >= 0) {
      return { delayMs: Math.min(seconds * 1000, MAX_HEADER_DELAY_MS), source: 'RateLimit-Reset' };
    }
  }

  return { source: 'default' };
};

export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};
