/**
 * PayPal API Adapter
 *
 * HTTP client wrapper for the PayPal REST APIs with rate limiting,
 * retries and token refresh.
 */

import { randomUUID } from 'crypto';
import type { PayPalAuthService } from './paypal-auth.service';
import { getPayPalSettings } from './paypal.config';
import type {
  PayPalApiError,
  PayPalCapture,
  PayPalOrder,
  PayPalOrderRequest,
  PayPalRefund,
  PayPalRefundRequest,
  PayPalSubscription,
  PayPalSubscriptionRequest,
  PayPalWebhook,
  PayPalWebhookCreateRequest,
  PayPalWebhookList,
  PayPalWebhookVerificationRequest,
  PayPalWebhookVerificationResponse,
} from './types';
import { PayPalApiException, PayPalConfigurationError } from './types';

// ============================================================================
// Constants
// ============================================================================

const ORDERS_PATH = '/v2/checkout/orders';
const CAPTURES_PATH = '/v2/payments/captures';
const WEBHOOKS_PATH = '/v1/notifications/webhooks';
const VERIFY_WEBHOOK_PATH = '/v1/notifications/verify-webhook-signature';
const SUBSCRIPTIONS_PATH = '/v1/billing/subscriptions';

const DEFAULT_RATE_LIMIT_DELAY_MS = 100;
const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;

// ============================================================================
// Types
// ============================================================================

export interface PayPalApiAdapterOptions {
  /** Minimum gap between two requests */
  rateLimitDelayMs?: number;
  /** Base delay for exponential backoff */
  retryDelayMs?: number;
  /** Per-request timeout; defaults to PAYPAL_REQUEST_TIMEOUT_MS */
  timeoutMs?: number;
}

export interface PayPalApiRequestOptions {
  method?: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  body?: unknown;
}

export type WebhookHeaders = Headers | Record<string, string | undefined>;

// ============================================================================
// Request schedule
// ============================================================================

// Shared by every adapter in the process
let nextRequestSlot = 0;

/**
 * Reset the shared request schedule
 */
export function resetRequestSchedule(): void {
  nextRequestSlot = 0;
}

/**
 * Reserve the next free slot and return how long to wait for it
 */
function reserveRequestSlot(delayMs: number): number {
  const now = Date.now();
  const slot = Math.max(now, nextRequestSlot);
  nextRequestSlot = slot + delayMs;
  return slot - now;
}

// ============================================================================
// PayPalApiAdapter Class
// ============================================================================

export class PayPalApiAdapter {
  private readonly rateLimitDelayMs: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;

  constructor(
    private auth: PayPalAuthService,
    options: PayPalApiAdapterOptions = {}
  ) {
    this.rateLimitDelayMs = options.rateLimitDelayMs ?? DEFAULT_RATE_LIMIT_DELAY_MS;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? getPayPalSettings().requestTimeoutMs;
  }

  // ============================================================================
  // Orders API
  // ============================================================================

  /**
   * @see https://developer.paypal.com/docs/api/orders/v2/#orders_create
   */
  async createOrder(order: PayPalOrderRequest): Promise<PayPalOrder> {
    return this.request<PayPalOrder>(ORDERS_PATH, { method: 'POST', body: order });
  }

  async getOrder(orderId: string): Promise<PayPalOrder> {
    return this.request<PayPalOrder>(`${ORDERS_PATH}/${encodeURIComponent(orderId)}`);
  }

  async captureOrder(orderId: string): Promise<PayPalOrder> {
    return this.request<PayPalOrder>(`${ORDERS_PATH}/${encodeURIComponent(orderId)}/capture`, {
      method: 'POST',
    });
  }

  // ============================================================================
  // Payments API
  // ============================================================================

  async refundCapture(captureId: string, refund: PayPalRefundRequest = {}): Promise<PayPalRefund> {
    return this.request<PayPalRefund>(`${CAPTURES_PATH}/${encodeURIComponent(captureId)}/refund`, {
      method: 'POST',
      body: refund,
    });
  }

  async getCapture(captureId: string): Promise<PayPalCapture> {
    return this.request<PayPalCapture>(`${CAPTURES_PATH}/${encodeURIComponent(captureId)}`);
  }

  // ============================================================================
  // Webhooks API
  // ============================================================================

  async createWebhook(webhook: PayPalWebhookCreateRequest): Promise<PayPalWebhook> {
    return this.request<PayPalWebhook>(WEBHOOKS_PATH, { method: 'POST', body: webhook });
  }

  async listWebhooks(): Promise<PayPalWebhookList> {
    return this.request<PayPalWebhookList>(WEBHOOKS_PATH);
  }

  async deleteWebhook(webhookId: string): Promise<void> {
    await this.request<unknown>(`${WEBHOOKS_PATH}/${encodeURIComponent(webhookId)}`, {
      method: 'DELETE',
    });
  }

  /**
   * Ask PayPal whether a received webhook delivery is authentic
   * @see https://developer.paypal.com/docs/api/webhooks/v1/#verify-webhook-signature_post
   */
  async verifyWebhookSignature(
    webhookId: string,
    headers: WebhookHeaders,
    body: string | object
  ): Promise<PayPalWebhookVerificationResponse> {
    const header = (name: string) => readHeader(headers, name);

    const payload: PayPalWebhookVerificationRequest = {
      auth_algo: header('paypal-auth-algo'),
      cert_url: header('paypal-cert-url'),
      transmission_id: header('paypal-transmission-id'),
      transmission_sig: header('paypal-transmission-sig'),
      transmission_time: header('paypal-transmission-time'),
      webhook_id: webhookId,
      webhook_event: typeof body === 'string' ? JSON.parse(body) : body,
    };

    return this.request<PayPalWebhookVerificationResponse>(VERIFY_WEBHOOK_PATH, {
      method: 'POST',
      body: payload,
    });
  }

  // ============================================================================
  // Subscriptions API
  // ============================================================================

  async createSubscription(subscription: PayPalSubscriptionRequest): Promise<PayPalSubscription> {
    return this.request<PayPalSubscription>(SUBSCRIPTIONS_PATH, {
      method: 'POST',
      body: subscription,
    });
  }

  async getSubscription(subscriptionId: string): Promise<PayPalSubscription> {
    return this.request<PayPalSubscription>(
      `${SUBSCRIPTIONS_PATH}/${encodeURIComponent(subscriptionId)}`
    );
  }

  async cancelSubscription(subscriptionId: string, reason?: string): Promise<void> {
    await this.request<unknown>(
      `${SUBSCRIPTIONS_PATH}/${encodeURIComponent(subscriptionId)}/cancel`,
      {
        method: 'POST',
        body: reason ? { reason } : undefined,
      }
    );
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /**
   * Make an API request with rate limiting, retry logic and one token refresh on 401.
   * Every attempt of one POST call carries the same PayPal-Request-Id.
   */
  private async request<T>(path: string, options: PayPalApiRequestOptions = {}): Promise<T> {
    const method = options.method || 'GET';
    const requestId = method === 'POST' ? randomUUID() : undefined;
    let lastError: unknown;
    let tokenRefreshed = false;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      await this.enforceRateLimit();

      try {
        const { accessToken, apiBaseUrl } = await this.auth.getAccessToken();
        const url = `${apiBaseUrl}${path}`;

        console.log(`[PayPalApiAdapter] Request: ${method} ${path} (attempt ${attempt + 1}/${MAX_RETRIES})`);

        const response = await fetch(url, {
          method,
          headers: {
            Authorization: `Bearer ${accessToken}`,
            'Content-Type': 'application/json',
            Accept: 'application/json',
            'Accept-Language': 'en_US',
            ...(requestId ? { 'PayPal-Request-Id': requestId } : {}),
          },
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        // Handle rate limiting
        if (response.status === 429) {
          lastError = new PayPalApiException('Rate limited by PayPal', 429);
          if (attempt >= MAX_RETRIES - 1) {
            break;
          }

          // Retry-After may also be an HTTP date; fall back to backoff then
          const retryAfterSeconds = parseInt(response.headers.get('Retry-After') ?? '', 10);
          const delayMs = Number.isFinite(retryAfterSeconds)
            ? retryAfterSeconds * 1000
            : this.retryDelayMs * (attempt + 1);
          console.warn(`[PayPalApiAdapter] Rate limited, retrying after ${delayMs}ms`);
          await this.delay(delayMs);
          continue;
        }

        // Token revoked or expired early - refresh once
        if (response.status === 401 && !tokenRefreshed) {
          console.warn('[PayPalApiAdapter] Access token rejected, refreshing');
          tokenRefreshed = true;
          await this.auth.invalidate();
          attempt--;
          continue;
        }

        const text = await response.text();

        if (!response.ok) {
          const errorResponse = parseJson<PayPalApiError>(text);
          console.error(`[PayPalApiAdapter] Error response: ${response.status}`, errorResponse?.debug_id ?? '');

          const errorMessage =
            errorResponse?.message || `HTTP ${response.status}: ${response.statusText}`;

          throw new PayPalApiException(errorMessage, response.status, errorResponse);
        }

        // 204 and other empty bodies
        if (!text) {
          return {} as T;
        }

        return JSON.parse(text) as T;
      } catch (error) {
        lastError = error;

        // Missing configuration and 4xx errors (except 429) - don't retry
        if (error instanceof PayPalConfigurationError) {
          throw error;
        }

        if (
          error instanceof PayPalApiException &&
          error.statusCode >= 400 &&
          error.statusCode < 500
        ) {
          throw error;
        }

        console.error(`[PayPalApiAdapter] Request error:`, error);

        // Exponential backoff for network and server errors
        if (attempt < MAX_RETRIES - 1) {
          const delayMs = this.retryDelayMs * Math.pow(2, attempt);
          console.warn(`[PayPalApiAdapter] Request failed, retrying in ${delayMs}ms`);
          await this.delay(delayMs);
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error('Request failed after maximum retries');
  }

  /**
   * Wait for this request's slot in the shared schedule
   */
  private async enforceRateLimit(): Promise<void> {
    const waitMs = reserveRequestSlot(this.rateLimitDelayMs);

    if (waitMs > 0) {
      await this.delay(waitMs);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Case-insensitive header lookup over a Headers instance or a plain object
 */
export function readHeader(headers: WebhookHeaders, name: string): string | null {
  if (headers instanceof Headers) {
    return headers.get(name);
  }

  const wanted = name.toLowerCase();
  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === wanted);
  return entry?.[1] ?? null;
}

function parseJson<T>(text: string): T | undefined {
  if (!text) {
    return undefined;
  }

  try {
    return JSON.parse(text) as T;
  } catch {
    return undefined;
  }
}
