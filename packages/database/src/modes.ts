/**
 * PayPal environment definitions.
 *
 * A stored configuration targets exactly one PayPal environment; the mode
 * decides which REST host every request for that configuration goes to.
 */

export const PAYPAL_MODES = ['sandbox', 'live'] as const;
export type PayPalMode = (typeof PAYPAL_MODES)[number];

export const DEFAULT_PAYPAL_MODE: PayPalMode = 'sandbox';

/**
 * REST API hosts per mode
 */
export const PAYPAL_API_BASE_URLS: Record<PayPalMode, string> = {
  live: 'https://api-m.paypal.com',
  sandbox: 'https://api-m.sandbox.paypal.com',
};

/**
 * Get the API base URL for a mode
 */
export function getApiBaseUrl(mode: PayPalMode): string {
  return PAYPAL_API_BASE_URLS[mode];
}

/**
 * Check if a value is a valid PayPal mode
 */
export function isPayPalMode(value: string): value is PayPalMode {
  return (PAYPAL_MODES as readonly string[]).includes(value);
}

/**
 * Human readable label for a configuration, e.g. "Main account (sandbox)"
 */
export function formatConfigLabel(config: { name: string; mode: PayPalMode }): string {
  return `${config.name} (${config.mode})`;
}
