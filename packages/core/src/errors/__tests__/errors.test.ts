import { describe, expect, it } from 'vitest';

import { MalformedInputError, UpstreamFetchError } from '../index.js';

describe('MalformedInputError', () => {
  it('carries code, severity and transaction id', () => {
    const error = new MalformedInputError('amount is not an integer', 'transfer', {
      transactionId: '0xabc',
      additionalContext: { amount: '1.5' },
    });

    expect(error.name).toBe('MalformedInputError');
    expect(error.code).toBe('MALFORMED_INPUT');
    expect(error.severity).toBe('warning');
    expect(error.record).toBe('transfer');
    expect(error.toJSON()).toMatchObject({
      code: 'MALFORMED_INPUT',
      context: { amount: '1.5' },
      message: 'amount is not an integer',
      transactionId: '0xabc',
    });
  });
});

describe('UpstreamFetchError', () => {
  it('keeps the chain, address and cause', () => {
    const cause = new Error('socket hang up');
    const error = new UpstreamFetchError('fetch failed', 'ethereum', '0x1234', { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('UPSTREAM_FETCH_FAILED');
    expect(error.severity).toBe('error');
    expect(error.chain).toBe('ethereum');
    expect(error.address).toBe('0x1234');
    expect(error.cause).toBe(cause);
  });
});
