/**
 * PayPal Integration Module
 *
 * Exports all PayPal-related services, types, and utilities.
 */

// Types
export * from './types';

// Configuration
export { getPayPalSettings, DEFAULT_REQUEST_TIMEOUT_MS } from './paypal.config';
export type { PayPalSettings } from './paypal.config';

// Services
export { PayPalCredentialService } from './paypal-credential.service';
export type { StoreCredentialsInput, UpdateCredentialsInput } from './paypal-credential.service';
export { PayPalAuthService, clearTokenCache } from './paypal-auth.service';
export type { CredentialsLoader } from './paypal-auth.service';
export { PayPalApiAdapter, readHeader, resetRequestSchedule } from './paypal-api.adapter';
export type { PayPalApiAdapterOptions, WebhookHeaders } from './paypal-api.adapter';
export { PaymentService, extractCaptureDetails, mapCaptureStatus } from './payment.service';
export type { CaptureDetails, CaptureOutcome } from './payment.service';
export { WebhookManager } from './webhook-manager.service';
export { WebhookHandler } from './webhook-handler.service';
export type { WebhookResult, WebhookHandlerDependencies } from './webhook-handler.service';
export { createDefaultEventHandlers } from './webhook-event-handlers';
export type { WebhookEventHandler } from './webhook-event-handlers';
export { WebhookEventService } from './webhook-event.service';
export { createPayPalServices } from './paypal.client';
export type { PayPalServices, PayPalServicesOptions } from './paypal.client';
