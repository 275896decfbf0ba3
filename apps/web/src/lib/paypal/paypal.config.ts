import { z } from 'zod';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const settingsSchema = z.object({
  PAYPAL_WEBHOOK_ID: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  PAYPAL_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .catch(undefined),
});

export interface PayPalSettings {
  webhookId?: string;
  requestTimeoutMs: number;
}

/**
 * Read PayPal runtime settings from the environment
 */
export function getPayPalSettings(env: NodeJS.ProcessEnv = process.env): PayPalSettings {
  const parsed = settingsSchema.parse({
    PAYPAL_WEBHOOK_ID: env.PAYPAL_WEBHOOK_ID,
    PAYPAL_REQUEST_TIMEOUT_MS: env.PAYPAL_REQUEST_TIMEOUT_MS || undefined,
  });

  return {
    webhookId: parsed.PAYPAL_WEBHOOK_ID,
    requestTimeoutMs: parsed.PAYPAL_REQUEST_TIMEOUT_MS ?? DEFAULT_REQUEST_TIMEOUT_MS,
  };
}
