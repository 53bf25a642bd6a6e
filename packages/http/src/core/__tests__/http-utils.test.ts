import { describe, expect, it } from 'vitest';

import {
  buildQueryString,
  buildUrl,
  calculateExponentialBackoff,
  classifyHttpError,
  parseRateLimitHeaders,
  parseRetryAfter,
  parseUnixTimestamp,
  sanitizeUrl,
} from '../http-utils.js';

describe('http-utils (pure functions)', () => {
  describe('buildUrl', () => {
    it('joins base URL and endpoint', () => {
      expect(buildUrl('https://api.example.com/', '/resource')).toBe('https://api.example.com/resource');
      expect(buildUrl('https://api.example.com', 'resource')).toBe('https://api.example.com/resource');
      expect(buildUrl('https://api.example.com', '/')).toBe('https://api.example.com');
    });

    it('appends a query string with & when the endpoint already has one', () => {
      expect(buildUrl('https://api.example.com', '/a?x=1', { y: 2 })).toBe('https://api.example.com/a?x=1&y=2');
    });
  });

  describe('buildQueryString', () => {
    it('skips undefined values', () => {
      expect(buildQueryString({ fsym: 'ETH', toTs: undefined, limit: 2000 })).toBe('fsym=ETH&limit=2000');
      expect(buildQueryString()).toBe('');
    });
  });

  describe('sanitizeUrl', () => {
    it('redacts sensitive query parameters', () => {
      expect(sanitizeUrl('https://api.example.com/r?api_key=test-secret&foo=bar')).toBe(
        'https://api.example.com/r?api_key=***&foo=bar'
      );
    });

    it('returns invalid URLs unchanged', () => {
      expect(sanitizeUrl('not a url')).toBe('not a url');
    });
  });

  describe('classifyHttpError', () => {
    it('classifies statuses for retry', () => {
      expect(classifyHttpError(429)).toEqual({ shouldRetry: true, type: 'rate_limit' });
      expect(classifyHttpError(503)).toEqual({ shouldRetry: true, type: 'server' });
      expect(classifyHttpError(500)).toEqual({ shouldRetry: false, type: 'server' });
      expect(classifyHttpError(404)).toEqual({ shouldRetry: false, type: 'client' });
      expect(classifyHttpError(302)).toEqual({ shouldRetry: true, type: 'unknown' });
    });
  });

  describe('parseRetryAfter', () => {
    it('parses seconds and caps at 30s', () => {
      expect(parseRetryAfter('5', 0)).toBe(5000);
      expect(parseRetryAfter('0', 0)).toBe(1000);
      expect(parseRetryAfter('120', 0)).toBe(30_000);
    });

    it('parses an HTTP date relative to now', () => {
      const now = Date.parse('2024-01-01T00:00:00Z');
      expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:10 GMT', now)).toBe(10_000);
    });

    it('returns undefined for garbage', () => {
      expect(parseRetryAfter('soon', 0)).toBeUndefined();
    });
  });

  describe('parseUnixTimestamp', () => {
    it('computes the delay to a future reset', () => {
      expect(parseUnixTimestamp('1010', 1_000_000)).toBe(10_000);
      expect(parseUnixTimestamp('900', 1_000_000)).toBeUndefined();
    });
  });

  describe('parseRateLimitHeaders', () => {
    it('prefers Retry-After', () => {
      expect(parseRateLimitHeaders({ 'ratelimit-reset': '9', 'retry-after': '2' }, 0)).toEqual({
        delayMs: 2000,
        source: 'Retry-After',
      });
    });

    it('falls back to RateLimit-Reset and then the default', () => {
      expect(parseRateLimitHeaders({ 'ratelimit-reset': '4' }, 0)).toEqual({ delayMs: 4000, source: 'RateLimit-Reset' });
      expect(parseRateLimitHeaders({}, 0)).toEqual({ source: 'default' });
    });
  });

  describe('calculateExponentialBackoff', () => {
    it('doubles per attempt up to the max', () => {
      expect(calculateExponentialBackoff(1, 1000, 10_000)).toBe(1000);
      expect(calculateExponentialBackoff(3, 1000, 10_000)).toBe(4000);
      expect(calculateExponentialBackoff(5, 1000, 10_000)).toBe(10_000);
    });
  });
});
