/**
 * Shared utilities for payhub
 */

/**
 * Parse a PayPal money value ("12.50", 12.5) into a number.
 * Returns null for anything that is not a finite number.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Mask a credential for display, keeping the last few characters
 */
export function maskSecret(value: string, visible: number = 4): string {
  if (value.length <= visible) {
    return '*'.repeat(value.length);
  }
  return `${'*'.repeat(value.length - visible)}${value.slice(-visible)}`;
}

/**
 * Format a money amount with its currency code, e.g. "10.00 USD"
 */
export function formatAmount(amount: number, currencyCode: string): string {
  return `${amount.toFixed(2)} ${currencyCode}`;
}
