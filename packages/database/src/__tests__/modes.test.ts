import { describe, it, expect } from 'vitest';
import {
  PAYPAL_MODES,
  getApiBaseUrl,
  isPayPalMode,
  formatConfigLabel,
} from '../modes';

describe('PayPal modes', () => {
  it('should list sandbox before live', () => {
    expect(PAYPAL_MODES).toEqual(['sandbox', 'live']);
  });

  describe('getApiBaseUrl', () => {
    it('should return the live host for live mode', () => {
      expect(getApiBaseUrl('live')).toBe('https://api-m.paypal.com');
    });

    it('should return the sandbox host for sandbox mode', () => {
      expect(getApiBaseUrl('sandbox')).toBe('https://api-m.sandbox.paypal.com');
    });
  });

  describe('isPayPalMode', () => {
    it('should accept known modes', () => {
      expect(isPayPalMode('sandbox')).toBe(true);
      expect(isPayPalMode('live')).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isPayPalMode('production')).toBe(false);
      expect(isPayPalMode('LIVE')).toBe(false);
      expect(isPayPalMode('')).toBe(false);
    });
  });

  describe('formatConfigLabel', () => {
    it('should combine name and mode', () => {
      expect(formatConfigLabel({ name: 'Main account', mode: 'live' })).toBe('Main account (live)');
    });
  });
});
