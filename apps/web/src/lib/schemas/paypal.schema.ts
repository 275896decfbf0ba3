import { z } from 'zod';
import { PAYPAL_MODES } from '@payhub/database';
import {
  CONFIG_ORDERING_COLUMNS,
  type ConfigOrderingColumn,
} from '@/lib/repositories/paypal-config.repository';
import type { OrderingOption } from '@/lib/repositories/base.repository';

/**
 * Query-string booleans arrive as text
 */
const booleanParam = z.enum(['true', 'false']).transform((value) => value === 'true');

const pageParams = {
  page: z.coerce.number().int().positive().optional(),
  pageSize: z.coerce.number().int().positive().max(100).optional(),
};

// ============================================================================
// Configurations
// ============================================================================

export const createConfigSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100, 'Name is too long'),
  clientId: z.string().min(1, 'Client ID is required'),
  clientSecret: z.string().min(1, 'Client secret is required'),
  mode: z.enum(PAYPAL_MODES).default('sandbox'),
});

export type CreateConfigInput = z.infer<typeof createConfigSchema>;

export const updateConfigSchema = z
  .object({
    clientId: z.string().min(1).optional(),
    clientSecret: z.string().min(1).optional(),
    mode: z.enum(PAYPAL_MODES).optional(),
  })
  .refine((data) => Object.values(data).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateConfigInput = z.infer<typeof updateConfigSchema>;

/**
 * "name", "-created_at" etc.
 */
export const configOrderingSchema = z
  .string()
  .regex(/^-?(name|created_at|updated_at)$/, 'Invalid ordering')
  .transform((value): OrderingOption<ConfigOrderingColumn> => {
    const descending = value.startsWith('-');
    const column = CONFIG_ORDERING_COLUMNS.find((c) => c === value.replace(/^-/, ''));
    return { column: column ?? 'created_at', ascending: !descending };
  });

export const configQuerySchema = z.object({
  mode: z.enum(PAYPAL_MODES).optional(),
  isActive: booleanParam.optional(),
  name: z.string().min(1).optional(),
  search: z.string().min(1).optional(),
  ordering: configOrderingSchema.optional(),
  ...pageParams,
});

export type ConfigQuery = z.infer<typeof configQuerySchema>;

export const bulkConfigActiveSchema = z.object({
  ids: z.array(z.string().min(1)).min(1, 'At least one id is required'),
  isActive: z.boolean(),
});

// ============================================================================
// Orders, payments, subscriptions
// ============================================================================

const amountSchema = z.object({
  currency_code: z.string().length(3, 'Currency code must be 3 letters'),
  value: z.string().regex(/^\d+(\.\d+)?$/, 'Amount value must be a decimal string'),
});

const purchaseUnitSchema = z
  .object({
    reference_id: z.string().optional(),
    custom_id: z.string().optional(),
    invoice_id: z.string().optional(),
    description: z.string().optional(),
    amount: amountSchema.extend({
      breakdown: z.record(amountSchema).optional(),
    }),
  })
  .passthrough();

export const createOrderSchema = z.object({
  intent: z.enum(['CAPTURE', 'AUTHORIZE']).default('CAPTURE'),
  purchase_units: z.array(purchaseUnitSchema).min(1, 'At least one purchase unit is required'),
  application_context: z.record(z.unknown()).optional(),
});

export type CreateOrderInput = z.infer<typeof createOrderSchema>;

export const refundSchema = z.object({
  amount: amountSchema.optional(),
  invoice_id: z.string().optional(),
  note_to_payer: z.string().max(255).optional(),
});

export const createSubscriptionSchema = z.object({
  plan_id: z.string().min(1, 'Plan ID is required'),
  start_time: z.string().optional(),
  quantity: z.string().optional(),
  custom_id: z.string().optional(),
  subscriber: z.record(z.unknown()).optional(),
  application_context: z.record(z.unknown()).optional(),
});

export const cancelSubscriptionSchema = z.object({
  reason: z.string().min(1).max(128).optional(),
});

// ============================================================================
// Webhooks
// ============================================================================

export const createWebhookEndpointSchema = z.object({
  url: z.string().url('A valid URL is required'),
  events: z.array(z.string().min(1)).min(1, 'At least one event type is required'),
  name: z.string().trim().min(1).max(100).optional(),
});

export const updateWebhookEndpointSchema = z.object({
  events: z.array(z.string().min(1)),
});

export const webhookEventQuerySchema = z.object({
  eventType: z.string().min(1).optional(),
  processed: booleanParam.optional(),
  resourceType: z.string().min(1).optional(),
  search: z.string().min(1).optional(),
  ...pageParams,
});

export const bulkWebhookEventSchema = z.object({
  ids: z.array(z.string().min(1)).min(1, 'At least one id is required'),
  processed: z.boolean(),
});
