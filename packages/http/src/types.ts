import type { ZodType } from 'zod';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  rateLimit: RateLimitConfig;
  retries?: number | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  headers?: Record<string, string> | undefined;
  /** Appended to the endpoint; undefined values are dropped */
  query?: Record<string, string | number | undefined> | undefined;
  schema?: ZodType<unknown> | undefined;
  timeout?: number | undefined;
  /**
   * Inspect the parsed response body before it is returned. Return a RateLimitError
   * to trigger the same retry-with-backoff path as an HTTP 429.
   * For APIs that signal rate limits inside a 200 body.
   */
  validateResponse?: ((data: unknown) => RateLimitError | undefined) | undefined;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number | undefined
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

export interface RateLimitConfig {
  burstLimit?: number | undefined;
  requestsPerHour?: number | undefined;
  requestsPerMinute?: number | undefined;
  requestsPerSecond: number;
}
