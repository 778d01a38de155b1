import { describe, it, expect } from 'vitest';
import { normalizeAmount } from '../src/processing/amount.js';

describe('normalizeAmount', () => {
  it('strips thousands separators', () => {
    expect(normalizeAmount('1,234,567')).toBe(1234567);
  });

  it('keeps the sign of negative amounts', () => {
    expect(normalizeAmount('-52,000')).toBe(-52000);
  });

  it('ignores surrounding and embedded whitespace', () => {
    expect(normalizeAmount(' 300 ')).toBe(300);
    expect(normalizeAmount('1 000')).toBe(1000);
  });

  it('maps null, undefined and empty input to 0', () => {
    expect(normalizeAmount(null)).toBe(0);
    expect(normalizeAmount(undefined)).toBe(0);
    expect(normalizeAmount('')).toBe(0);
    expect(normalizeAmount('   ')).toBe(0);
  });

  it('treats a lone dash as 0', () => {
    expect(normalizeAmount('-')).toBe(0);
  });

  it('maps unparseable strings to 0 without throwing', () => {
    expect(normalizeAmount('N/A')).toBe(0);
    expect(normalizeAmount('12abc')).toBe(0);
    expect(normalizeAmount('0x1F')).toBe(0);
    expect(normalizeAmount('Infinity')).toBe(0);
  });

  it('passes finite numbers through and zeroes non-finite ones', () => {
    expect(normalizeAmount(42)).toBe(42);
    expect(normalizeAmount(Number.NaN)).toBe(0);
    expect(normalizeAmount(Number.POSITIVE_INFINITY)).toBe(0);
  });

  it('parses decimals', () => {
    expect(normalizeAmount('1,234.5')).toBe(1234.5);
  });
});
