import { describe, expect, it } from 'vitest';

import { getErrorMessage, isErrorWithMessage, isNonEmptyString, wrapError } from '../type-guard-utils.js';

describe('type guard utilities', () => {
  it('detects errors with messages', () => {
    expect(isErrorWithMessage(new Error('boom'))).toBe(true);
    expect(isErrorWithMessage({ message: 'boom' })).toBe(false);
  });

  it('extracts messages from unknown values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(undefined, 'fallback')).toBe('fallback');
  });

  it('wraps errors with context', () => {
    const result = wrapError(new Error('disk full'), 'Failed to save prices');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Failed to save prices: disk full');
    }
  });

  it('checks for non-empty strings', () => {
    expect(isNonEmptyString('abc')).toBe(true);
    expect(isNonEmptyString('   ')).toBe(false);
    expect(isNonEmptyString(3)).toBe(false);
  });
});
