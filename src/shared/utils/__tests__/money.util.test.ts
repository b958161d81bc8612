import { describe, it, expect } from 'vitest';
import { formatMoney, multiplyMoney, parseMoney, sumMoney } from '../money.util.js';

describe('money.util', () => {
  describe('parseMoney', () => {
    it('parses strings with two fractional digits', () => {
      expect(parseMoney('12.50')).toBe(1250);
      expect(parseMoney('0.99')).toBe(99);
      expect(parseMoney('100.00')).toBe(10000);
    });

    it('accepts fewer fractional digits', () => {
      expect(parseMoney('12.5')).toBe(1250);
      expect(parseMoney('7')).toBe(700);
    });

    it('accepts JSON numbers', () => {
      expect(parseMoney(12.5)).toBe(1250);
      expect(parseMoney(2.99)).toBe(299);
      expect(parseMoney(0)).toBe(0);
    });

    it('keeps the sign of negative amounts', () => {
      expect(parseMoney('-1.25')).toBe(-125);
      expect(parseMoney('-0.00')).toBe(0);
    });

    it('trims surrounding whitespace', () => {
      expect(parseMoney(' 3.10 ')).toBe(310);
    });

    it('rejects more than two fractional digits', () => {
      expect(parseMoney('1.999')).toBeNull();
      expect(parseMoney(0.1 + 0.2)).toBeNull();
    });

    it('rejects non-numeric and exponent forms', () => {
      expect(parseMoney('abc')).toBeNull();
      expect(parseMoney('')).toBeNull();
      expect(parseMoney('1e3')).toBeNull();
      expect(parseMoney('.50')).toBeNull();
      expect(parseMoney(Number.NaN)).toBeNull();
      expect(parseMoney(Number.POSITIVE_INFINITY)).toBeNull();
    });
  });

  describe('formatMoney', () => {
    it('always renders two fractional digits', () => {
      expect(formatMoney(1799)).toBe('17.99');
      expect(formatMoney(1500)).toBe('15.00');
      expect(formatMoney(5)).toBe('0.05');
      expect(formatMoney(0)).toBe('0.00');
    });

    it('renders negative amounts', () => {
      expect(formatMoney(-125)).toBe('-1.25');
    });
  });

  describe('arithmetic', () => {
    it('multiplies by a quantity exactly', () => {
      expect(multiplyMoney(250, 2)).toBe(500);
      expect(multiplyMoney(10, 3)).toBe(30);
    });

    it('sums amounts exactly', () => {
      // 0.10 + 0.20 is exactly 0.30 in cents
      expect(sumMoney([10, 20])).toBe(30);
      expect(formatMoney(sumMoney([10, 20]))).toBe('0.30');
      expect(sumMoney([])).toBe(0);
    });

    it('rejects products beyond the exact integer range', () => {
      expect(() => multiplyMoney(Number.MAX_SAFE_INTEGER, 2)).toThrow(RangeError);
    });

    it('rejects sums beyond the exact integer range', () => {
      expect(() => sumMoney([Number.MAX_SAFE_INTEGER, 1])).toThrow(RangeError);
      expect(sumMoney([Number.MAX_SAFE_INTEGER - 1, 1])).toBe(Number.MAX_SAFE_INTEGER);
    });
  });
});
