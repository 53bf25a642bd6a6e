import { Decimal } from 'decimal.js';

// Most tokens use up to 18 decimal places; prices are multiplied against raw
// amounts of up to ~30 digits, so precision stays well above that.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 40,
});

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(
  value: string | number | Decimal | undefined | null,
  out?: { value: Decimal }
): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Convert a raw integer token amount to whole units (e.g. 1500000n with 6 decimals -> 1.5)
 */
export function rawAmountToDecimal(raw: bigint, decimals: number): Decimal {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new Error(`Invalid token decimals: ${decimals}`);
  }
  return new Decimal(raw.toString()).div(new Decimal(10).pow(decimals));
}

/**
 * Parse a base-10 integer string (optionally signed) to bigint.
 * Returns undefined for anything else, including decimals and exponents.
 */
export function parseRawAmount(value: string | number | bigint): bigint | undefined {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? BigInt(value) : undefined;
  }
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return undefined;
  return BigInt(trimmed);
}

/**
 * Render a Decimal without exponent notation, trailing zeros removed
 */
export function formatDecimal(value: Decimal): string {
  return value.toFixed();
}
