import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatDecimal, parseDecimal, parseRawAmount, rawAmountToDecimal, tryParseDecimal } from '../decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('tryParseDecimal', () => {
    it('should parse valid string to Decimal', () => {
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal('123.456', out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('123.456');
    });

    it('should treat empty values as zero', () => {
      const out = { value: new Decimal(1) };

      expect(tryParseDecimal('', out)).toBe(true);
      expect(out.value.isZero()).toBe(true);
    });

    it('should reject unparseable strings', () => {
      expect(tryParseDecimal('not-a-number')).toBe(false);
    });
  });

  describe('parseDecimal', () => {
    it('should fall back to zero for invalid input', () => {
      expect(parseDecimal('abc').isZero()).toBe(true);
    });

    it('should parse numbers', () => {
      expect(parseDecimal(0.5).toString()).toBe('0.5');
    });
  });

  describe('rawAmountToDecimal', () => {
    it('should scale by token decimals', () => {
      expect(rawAmountToDecimal(31356770000n, 6).toFixed()).toBe('31356.77');
      expect(rawAmountToDecimal(31200000000000000000000n, 18).toFixed()).toBe('31200');
    });

    it('should keep sub-unit precision', () => {
      expect(rawAmountToDecimal(1n, 18).toFixed()).toBe('0.000000000000000001');
    });

    it('should reject negative decimals', () => {
      expect(() => rawAmountToDecimal(1n, -1)).toThrow('Invalid token decimals: -1');
    });
  });

  describe('parseRawAmount', () => {
    it('should parse signed integer strings', () => {
      expect(parseRawAmount('123')).toBe(123n);
      expect(parseRawAmount(' -42 ')).toBe(-42n);
    });

    it('should reject decimals and exponents', () => {
      expect(parseRawAmount('1.5')).toBeUndefined();
      expect(parseRawAmount('1e18')).toBeUndefined();
      expect(parseRawAmount('')).toBeUndefined();
    });

    it('should accept safe integers and bigints', () => {
      expect(parseRawAmount(7)).toBe(7n);
      expect(parseRawAmount(2n ** 70n)).toBe(2n ** 70n);
      expect(parseRawAmount(0.5)).toBeUndefined();
    });
  });

  describe('formatDecimal', () => {
    it('should not use exponent notation', () => {
      expect(formatDecimal(new Decimal('1e-12'))).toBe('0.000000000001');
      expect(formatDecimal(new Decimal('105.0'))).toBe('105');
    });
  });
});
