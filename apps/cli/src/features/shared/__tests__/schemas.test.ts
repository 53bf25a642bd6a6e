import { describe, expect, it } from 'vitest';

import { AssetSymbolSchema, firstIssueMessage, TradesCommandOptionsSchema } from '../schemas.js';

describe('TradesCommandOptionsSchema', () => {
  it('normalizes the chain and applies defaults', () => {
    expect(TradesCommandOptionsSchema.parse({ chain: ' Ethereum ', prices: true })).toEqual({
      chain: 'ethereum',
      offline: false,
      prices: true,
    });
  });

  it('keeps --no-prices', () => {
    expect(TradesCommandOptionsSchema.parse({ chain: 'solana', prices: false }).prices).toBe(false);
  });

  it('rejects unsupported chains with the supported list', () => {
    const result = TradesCommandOptionsSchema.safeParse({ chain: 'dogechain' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(firstIssueMessage(result.error)).toContain("Chain 'dogechain' not supported. Supported chains: ");
    }
  });
});

describe('AssetSymbolSchema', () => {
  it('uppercases symbols', () => {
    expect(AssetSymbolSchema.parse(' eth ')).toBe('ETH');
  });

  it('rejects symbols with other characters', () => {
    expect(AssetSymbolSchema.safeParse('ETH/USD').success).toBe(false);
  });
});
