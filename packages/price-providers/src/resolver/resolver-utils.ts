/**
 * Pure pieces of price resolution: interpolation and underlying-asset lookup
 */

import type { PricePoint } from '@swaptrace/core';
import { SECONDS_PER_HOUR } from '@swaptrace/core';
import { Decimal } from 'decimal.js';
import { z } from 'zod';

import stablecoinsJson from './stablecoins.json' with { type: 'json' };
import underlyingAssetsJson from './underlying-assets.json' with { type: 'json' };

const StablecoinsSchema = z.array(z.string().min(1));
const UnderlyingAssetsSchema = z.record(z.string().min(1), z.string().min(1));

export const DEFAULT_STABLECOINS: readonly string[] = StablecoinsSchema.parse(stablecoinsJson);
export const DEFAULT_UNDERLYING_ASSETS: Readonly<Record<string, string>> =
  UnderlyingAssetsSchema.parse(underlyingAssetsJson);

/**
 * Linear interpolation across the fixed one-hour window starting at `before`.
 * With t on before.timestamp the result is before.price exactly.
 */
export function interpolatePrice(before: PricePoint, after: PricePoint | undefined, timestamp: number): Decimal {
  const afterWeight = new Decimal(timestamp - before.timestamp).div(SECONDS_PER_HOUR);
  if (!after || afterWeight.isZero()) {
    return before.price;
  }
  const beforeWeight = new Decimal(before.timestamp + SECONDS_PER_HOUR - timestamp).div(SECONDS_PER_HOUR);
  return before.price.mul(beforeWeight).plus(after.price.mul(afterWeight));
}

export class UnderlyingAssetLookup {
  private readonly explicit: ReadonlyMap<string, string>;
  private readonly known: ReadonlySet<string>;

  constructor(underlyingAssets: Readonly<Record<string, string>>, stablecoins: readonly string[]) {
    this.explicit = new Map(Object.entries(underlyingAssets));
    this.known = new Set([...Object.values(underlyingAssets), ...stablecoins]);
  }

  /**
   * Underlying symbol for a wrapped or derivative token, or undefined.
   *
   * Explicit entries win. Otherwise the symbol patterns PT-X-DATE, aEthX, aX and fX
   * (X starting uppercase) are tried, and the candidate must be a known underlying
   * or itself have an explicit entry.
   */
  find(symbol: string): string | undefined {
    const explicit = this.explicit.get(symbol);
    if (explicit !== undefined) {
      return explicit;
    }

    const candidate = extractCandidate(symbol);
    if (candidate === undefined || candidate === symbol) {
      return undefined;
    }
    if (this.known.has(candidate)) {
      return candidate;
    }
    return this.explicit.get(candidate);
  }
}

function extractCandidate(symbol: string): string | undefined {
  if (symbol.startsWith('PT-')) {
    const parts = symbol.split('-');
    return parts.length >= 3 && parts[1] ? parts[1] : undefined;
  }

  const aaveEth = /^aEth([A-Z].*)$/.exec(symbol);
  if (aaveEth) {
    return aaveEth[1];
  }

  const prefixed = /^[af]([A-Z].*)$/.exec(symbol);
  return prefixed ? prefixed[1] : undefined;
}
