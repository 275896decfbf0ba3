export * from './types';
export * from './modes';
import type { Tables, TablesInsert, TablesUpdate } from './types';

// Convenience type aliases for common tables
export type PayPalConfig = Tables<'paypal_configs'>;
export type PayPalConfigInsert = TablesInsert<'paypal_configs'>;
export type PayPalConfigUpdate = TablesUpdate<'paypal_configs'>;

export type WebhookEvent = Tables<'paypal_webhook_events'>;
export type WebhookEventInsert = TablesInsert<'paypal_webhook_events'>;
export type WebhookEventUpdate = TablesUpdate<'paypal_webhook_events'>;

export type WebhookEndpoint = Tables<'paypal_webhook_endpoints'>;
export type WebhookEndpointInsert = TablesInsert<'paypal_webhook_endpoints'>;
export type WebhookEndpointUpdate = TablesUpdate<'paypal_webhook_endpoints'>;

export type Payment = Tables<'paypal_payments'>;
export type PaymentInsert = TablesInsert<'paypal_payments'>;
export type PaymentUpdate = TablesUpdate<'paypal_payments'>;
