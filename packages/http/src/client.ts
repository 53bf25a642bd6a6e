import { getLogger, type Logger } from '@swaptrace/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import * as RateLimitCore from './core/rate-limit.js';
import type { HttpEffects, RateLimitState } from './core/types.js';
import { createInitialRateLimitState } from './core/types.js';
import type { HttpClientConfig, HttpRequestOptions } from './types.js';
import { HttpError, RateLimitError, ResponseValidationError } from './types.js';

const DEFAULT_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 10_000;

type AttemptOutcome<T> =
  | { kind: 'done'; result: Result<T, Error> }
  | { kind: 'retry'; delayMs: number; error: Error; reason: 'rate_limit' | 'retry' };

export class HttpClient {
  private readonly config: HttpClientConfig & { retries: number; timeout: number };
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  // Mutable state (only place side effects live)
  private rateLimitState: RateLimitState;

  // Async mutex for rate limiter access
  private rateLimiterLock: Promise<void> = Promise.resolve();

  private closePromise?: Promise<void>;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'swaptrace/0.1.0',
        ...config.defaultHeaders,
      },
      retries: config.retries ?? DEFAULT_RETRIES,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    // undici agent for connection pooling and clean shutdown
    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.rateLimitState = createInitialRateLimitState(config.rateLimit);

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.config.timeout}ms, Retries: ${this.config.retries}, RateLimit: ${JSON.stringify(config.rateLimit)}`
    );
  }

  /**
   * GET with schema validation
   */
  async get<T>(endpoint: string, options: HttpRequestOptions & { schema: ZodType<T> }): Promise<Result<T, Error>>;
  /**
   * GET without validation
   */
  async get(endpoint: string, options?: HttpRequestOptions): Promise<Result<unknown, Error>>;
  async get(endpoint: string, options: HttpRequestOptions = {}): Promise<Result<unknown, Error>> {
    return this.request(endpoint, options);
  }

  /**
   * Make a GET request with rate limiting, retries, and error handling
   */
  private async request(endpoint: string, options: HttpRequestOptions): Promise<Result<unknown, Error>> {
    if (this.closePromise) {
      return err(new Error(`${this.config.providerName} HTTP client is closed`));
    }

    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint, options.query);
    const retries = this.config.retries;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= retries; attempt++) {
      const rateLimitResult = await this.waitForRateLimit();
      if (rateLimitResult.isErr()) {
        return err(rateLimitResult.error);
      }

      this.effects.log(
        'debug',
        `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${retries}`
      );

      const outcome = await this.attempt(url, endpoint, options, attempt);
      if (outcome.kind === 'done') {
        return outcome.result;
      }

      lastError = outcome.error;
      if (attempt < retries) {
        this.effects.log(
          'debug',
          `Retrying after delay - Reason: ${outcome.reason}, Delay: ${outcome.delayMs}ms, NextAttempt: ${attempt + 1}`
        );
        await this.effects.delay(outcome.delayMs);
      }
    }

    return err(lastError ?? new Error('Request failed with unknown error'));
  }

  private async attempt(
    url: string,
    endpoint: string,
    options: HttpRequestOptions,
    attempt: number
  ): Promise<AttemptOutcome<unknown>> {
    const timeout = options.timeout ?? this.config.timeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await this.effects.fetch(url, {
        headers: { ...this.config.defaultHeaders, ...options.headers },
        method: 'GET',
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        return this.handleErrorStatus(response, errorText, attempt);
      }

      const data: unknown = await response.json();

      // Application-level rate limits (HTTP 200 with a rate limit message in the body)
      if (options.validateResponse) {
        const rateLimitError = options.validateResponse(data);
        if (rateLimitError) {
          const baseDelay = rateLimitError.retryAfter ?? 2000;
          const delayMs = HttpUtils.calculateExponentialBackoff(attempt, baseDelay, 60_000);
          this.effects.log(
            'warn',
            `Application-level rate limit detected - Reason: ${rateLimitError.message}, Delay: ${delayMs}ms, Attempt: ${attempt}/${this.config.retries}`
          );
          return { kind: 'retry', delayMs, error: rateLimitError, reason: 'rate_limit' };
        }
      }

      if (options.schema) {
        return { kind: 'done', result: this.validate(options.schema, data, endpoint, url) };
      }

      return { kind: 'done', result: ok(data) };
    } catch (error) {
      let lastError = error instanceof Error ? error : new Error(String(error));
      if (lastError.name === 'AbortError') {
        lastError = new Error(`Request timeout after ${timeout}ms`);
      }

      this.effects.log(
        'warn',
        `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${this.config.retries}, Error: ${lastError.message}`,
        { providerName: this.config.providerName }
      );

      const delayMs = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000);
      return { kind: 'retry', delayMs, error: lastError, reason: 'retry' };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private handleErrorStatus(response: Response, errorText: string, attempt: number): AttemptOutcome<unknown> {
    const classification = HttpUtils.classifyHttpError(response.status);

    if (classification.type === 'rate_limit') {
      const headers = Object.fromEntries(response.headers.entries());
      const retryDelayInfo = HttpUtils.parseRateLimitHeaders(headers, this.effects.now());
      const baseDelay = retryDelayInfo.delayMs ?? 2000;
      const delayMs = HttpUtils.calculateExponentialBackoff(attempt, baseDelay, 60_000);

      this.effects.log(
        'warn',
        `Rate limit 429 response received - Source: ${retryDelayInfo.source}, BaseDelay: ${baseDelay}ms, ActualDelay: ${delayMs}ms, Attempt: ${attempt}/${this.config.retries}`
      );

      return {
        kind: 'retry',
        delayMs,
        error: new RateLimitError(`${this.config.providerName} rate limit exceeded`, baseDelay),
        reason: 'rate_limit',
      };
    }

    const httpError = new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText);
    if (classification.shouldRetry) {
      const delayMs = HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000);
      return { kind: 'retry', delayMs, error: httpError, reason: 'retry' };
    }

    return { kind: 'done', result: err(httpError) };
  }

  private validate<T>(schema: ZodType<T>, data: unknown, endpoint: string, url: string): Result<T, Error> {
    const parseResult = schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = JSON.stringify(data).slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      {
        providerName: this.config.providerName,
        truncatedPayload,
        url: HttpUtils.sanitizeUrl(url),
      }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.providerName,
        endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }

  /**
   * Close the undici agent so keep-alive sockets do not hold the process open.
   * Idempotent: later calls return the same promise.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = (async () => {
        this.logger.debug('Closing HTTP agent connections');
        try {
          await this.agent.close();
        } catch (error) {
          const errorMessage = error instanceof Error ? error.message : String(error);
          this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
          throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
        }
      })();
    }
    return this.closePromise;
  }

  /**
   * Wait for rate limit permission (delegates to pure functions).
   * The lock is never held while waiting.
   */
  private async waitForRateLimit(): Promise<Result<void, Error>> {
    while (true) {
      const previousLock = this.rateLimiterLock;
      let releaseLock: () => void = () => undefined;
      this.rateLimiterLock = new Promise<void>((resolve) => {
        releaseLock = resolve;
      });

      let waitTimeMs = 0;

      try {
        await previousLock;
        const now = this.effects.now();

        this.rateLimitState = RateLimitCore.refillTokens(this.rateLimitState, now);
        this.rateLimitState = {
          ...this.rateLimitState,
          requestTimestamps: RateLimitCore.cleanOldTimestamps(this.rateLimitState.requestTimestamps, now),
        };

        if (RateLimitCore.shouldAllowRequest(this.rateLimitState, now)) {
          this.rateLimitState = RateLimitCore.consumeToken(this.rateLimitState, now);
          return ok();
        }

        waitTimeMs = RateLimitCore.calculateWaitTime(this.rateLimitState, now);
        this.effects.log(
          'debug',
          `Rate limit enforced, waiting before sending request - WaitTimeMs: ${waitTimeMs}, TokensAvailable: ${this.rateLimitState.tokens.toFixed(2)}`
        );
      } catch (error) {
        return err(error instanceof Error ? error : new Error(String(error)));
      } finally {
        releaseLock();
      }

      await this.effects.delay(waitTimeMs);
    }
  }
}
