// Pure rate limiting functions: state in, new state out

import type { RateLimitState, RateLimitWindow } from './types.js';

const LONGEST_WINDOW_MS = 3_600_000;

/**
 * Token bucket refill based on time passed since the last refill
 */
export const refillTokens = (state: RateLimitState, currentTime: number): RateLimitState => {
  if (state.lastRefill === 0) {
    return { ...state, lastRefill: currentTime };
  }

  const secondsPassed = (currentTime - state.lastRefill) / 1000;
  if (secondsPassed <= 0) {
    return state;
  }

  return {
    ...state,
    lastRefill: currentTime,
    tokens: Math.min(state.burstLimit, state.tokens + secondsPassed * state.requestsPerSecond),
  };
};

export const getRequestCountInWindow = (
  requestTimestamps: readonly number[],
  currentTime: number,
  windowMs: number
): number => {
  const windowStart = currentTime - windowMs;
  return requestTimestamps.filter((ts) => ts >= windowStart).length;
};

/**
 * Remove timestamps older than the longest window to bound memory
 */
export const cleanOldTimestamps = (requestTimestamps: readonly number[], currentTime: number): number[] =>
  requestTimestamps.filter((ts) => ts >= currentTime - LONGEST_WINDOW_MS);

export const canMakeRequestInAllWindows = (state: RateLimitState, currentTime: number): boolean =>
  state.windows.every(
    (window) => getRequestCountInWindow(state.requestTimestamps, currentTime, window.windowMs) < window.limit
  );

export const shouldAllowRequest = (state: RateLimitState, currentTime: number): boolean => {
  const refilled = refillTokens(state, currentTime);
  return refilled.tokens >= 1 && canMakeRequestInAllWindows(refilled, currentTime);
};

/**
 * Time until the oldest request in a full window falls out of it (+10ms buffer)
 */
const getWaitTimeForWindow = (
  requestTimestamps: readonly number[],
  currentTime: number,
  window: RateLimitWindow
): number => {
  if (getRequestCountInWindow(requestTimestamps, currentTime, window.windowMs) < window.limit) {
    return 0;
  }

  const windowStart = currentTime - window.windowMs;
  const oldestInWindow = requestTimestamps.find((ts) => ts >= windowStart);
  if (oldestInWindow === undefined) {
    return 0;
  }
  return oldestInWindow + window.windowMs - currentTime + 10;
};

/**
 * How long to wait before the next request may be sent (0 = now)
 */
export const calculateWaitTime = (state: RateLimitState, currentTime: number): number => {
  const refilled = refillTokens(state, currentTime);
  let maxWaitTime = 0;

  if (refilled.tokens < 1) {
    const missing = 1 - refilled.tokens;
    maxWaitTime = (missing / state.requestsPerSecond) * 1000;
  }

  for (const window of state.windows) {
    maxWaitTime = Math.max(maxWaitTime, getWaitTimeForWindow(refilled.requestTimestamps, currentTime, window));
  }

  return Math.ceil(maxWaitTime);
};

/**
 * Consume a token and record the request timestamp
 */
export const consumeToken = (state: RateLimitState, currentTime: number): RateLimitState => {
  const refilled = refillTokens(state, currentTime);

  return {
    ...refilled,
    requestTimestamps: [...cleanOldTimestamps(refilled.requestTimestamps, currentTime), currentTime],
    tokens: Math.max(0, refilled.tokens - 1),
  };
};
