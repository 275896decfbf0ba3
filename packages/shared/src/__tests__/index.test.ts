import { describe, it, expect } from 'vitest';
import { parseAmount, maskSecret, formatAmount } from '../index';

describe('parseAmount', () => {
  it('should parse decimal strings', () => {
    expect(parseAmount('12.50')).toBe(12.5);
    expect(parseAmount(' 100 ')).toBe(100);
  });

  it('should pass finite numbers through', () => {
    expect(parseAmount(7.25)).toBe(7.25);
  });

  it('should return null for unparseable values', () => {
    expect(parseAmount('abc')).toBeNull();
    expect(parseAmount('')).toBeNull();
    expect(parseAmount(undefined)).toBeNull();
    expect(parseAmount(null)).toBeNull();
    expect(parseAmount(Number.NaN)).toBeNull();
    expect(parseAmount({ value: '1.00' })).toBeNull();
  });
});

describe('maskSecret', () => {
  it('should keep the last four characters by default', () => {
    expect(maskSecret('abcdefgh')).toBe('****efgh');
  });

  it('should honour a custom visible length', () => {
    expect(maskSecret('abcdefgh', 2)).toBe('******gh');
  });

  it('should fully mask short values', () => {
    expect(maskSecret('abc')).toBe('***');
  });
});

describe('formatAmount', () => {
  it('should use two decimals and the currency code', () => {
    expect(formatAmount(10, 'USD')).toBe('10.00 USD');
    expect(formatAmount(3.5, 'EUR')).toBe('3.50 EUR');
  });
});
