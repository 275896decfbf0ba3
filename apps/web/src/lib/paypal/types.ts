/**
 * PayPal API Types
 *
 * Type definitions for the PayPal REST API surfaces used here:
 * Orders v2, Payments v2, Notifications (webhooks) v1 and Subscriptions v1.
 */

import type { PayPalMode } from '@payhub/database';

// ============================================================================
// Common Types
// ============================================================================

export interface PayPalAmount {
  currency_code: string;
  value: string;
}

export interface PayPalLink {
  href: string;
  rel: string;
  method?: string;
}

// ============================================================================
// OAuth Types
// ============================================================================

export interface PayPalTokenResponse {
  access_token: string;
  token_type: string;
  app_id?: string;
  expires_in?: number;
  nonce?: string;
  scope?: string;
}

export interface PayPalAccessToken {
  accessToken: string;
  apiBaseUrl: string;
}

/**
 * Decrypted credentials of one stored configuration
 */
export interface PayPalCredentials {
  configId: string;
  name: string;
  clientId: string;
  clientSecret: string;
  mode: PayPalMode;
  apiBaseUrl: string;
}

// ============================================================================
// Orders API Types
// ============================================================================

export type PayPalOrderIntent = 'CAPTURE' | 'AUTHORIZE';

export interface PayPalPurchaseUnitRequest {
  reference_id?: string;
  custom_id?: string;
  invoice_id?: string;
  description?: string;
  amount: PayPalAmount & { breakdown?: Record<string, PayPalAmount> };
  [key: string]: unknown;
}

export interface PayPalOrderRequest {
  intent: PayPalOrderIntent;
  purchase_units: PayPalPurchaseUnitRequest[];
  application_context?: Record<string, unknown>;
}

export interface PayPalCapture {
  id: string;
  status: string;
  amount?: PayPalAmount;
  custom_id?: string;
  invoice_id?: string;
  final_capture?: boolean;
  create_time?: string;
  update_time?: string;
  links?: PayPalLink[];
}

export interface PayPalPurchaseUnit {
  reference_id?: string;
  custom_id?: string;
  amount?: PayPalAmount;
  payments?: {
    captures?: PayPalCapture[];
  };
}

export interface PayPalOrder {
  id: string;
  status: string;
  intent?: PayPalOrderIntent;
  purchase_units?: PayPalPurchaseUnit[];
  links?: PayPalLink[];
  create_time?: string;
  update_time?: string;
}

// ============================================================================
// Payments API Types
// ============================================================================

export interface PayPalRefundRequest {
  amount?: PayPalAmount;
  invoice_id?: string;
  note_to_payer?: string;
}

export interface PayPalRefund {
  id: string;
  status: string;
  amount?: PayPalAmount;
  links?: PayPalLink[];
}

// ============================================================================
// Webhooks API Types
// ============================================================================

export interface PayPalWebhookEventType {
  name: string;
  description?: string;
}

export interface PayPalWebhook {
  id: string;
  url: string;
  event_types: PayPalWebhookEventType[];
  links?: PayPalLink[];
}

export interface PayPalWebhookList {
  webhooks?: PayPalWebhook[];
}

export interface PayPalWebhookCreateRequest {
  url: string;
  event_types: PayPalWebhookEventType[];
}

export interface PayPalWebhookVerificationRequest {
  auth_algo: string | null;
  cert_url: string | null;
  transmission_id: string | null;
  transmission_sig: string | null;
  transmission_time: string | null;
  webhook_id: string;
  webhook_event: unknown;
}

export interface PayPalWebhookVerificationResponse {
  verification_status?: 'SUCCESS' | 'FAILURE' | string;
}

/**
 * Body PayPal posts to a webhook listener
 */
export interface PayPalWebhookEvent {
  id: string;
  event_type: string;
  resource_type?: string;
  summary?: string;
  create_time?: string;
  event_version?: string;
  resource?: Record<string, unknown>;
}

// ============================================================================
// Subscriptions API Types
// ============================================================================

export interface PayPalSubscriptionRequest {
  plan_id: string;
  start_time?: string;
  quantity?: string;
  custom_id?: string;
  subscriber?: Record<string, unknown>;
  application_context?: Record<string, unknown>;
}

export interface PayPalSubscription {
  id: string;
  status: string;
  plan_id?: string;
  custom_id?: string;
  start_time?: string;
  links?: PayPalLink[];
}

// ============================================================================
// Error Types
// ============================================================================

export interface PayPalApiErrorDetail {
  issue: string;
  description?: string;
  field?: string;
  value?: string;
  location?: string;
}

export interface PayPalApiError {
  name?: string;
  message?: string;
  debug_id?: string;
  details?: PayPalApiErrorDetail[];
  links?: PayPalLink[];
  error?: string;
  error_description?: string;
}

export class PayPalApiException extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public errorResponse?: PayPalApiError
  ) {
    super(message);
    this.name = 'PayPalApiException';
  }
}

/**
 * The OAuth token request was rejected
 */
export class PayPalAuthenticationError extends PayPalApiException {
  constructor(message: string, statusCode: number, errorResponse?: PayPalApiError) {
    super(message, statusCode, errorResponse);
    this.name = 'PayPalAuthenticationError';
  }
}

/**
 * No usable stored configuration
 */
export class PayPalConfigurationError extends Error {
  constructor(message = 'No active PayPal configuration found.') {
    super(message);
    this.name = 'PayPalConfigurationError';
  }
}

export class ConfigurationNotFoundError extends Error {
  constructor(public configName: string) {
    super(`Configuration '${configName}' not found.`);
    this.name = 'ConfigurationNotFoundError';
  }
}

// ============================================================================
// Service Result Types
// ============================================================================

export interface PayPalConnectionTestResult {
  success: boolean;
  error?: string;
}
