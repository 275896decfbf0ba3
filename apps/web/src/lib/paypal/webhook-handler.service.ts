/**
 * Webhook Handler
 *
 * Accepts PayPal webhook deliveries: de-duplicates by event id, verifies
 * the signature through PayPal (fail closed), stores the event and
 * dispatches it to the handler registered for its type.
 */

import type { Json, WebhookEvent } from '@payhub/database';
import type { WebhookEndpointRepository, WebhookEventRepository } from '@/lib/repositories';
import type { PayPalApiAdapter, WebhookHeaders } from './paypal-api.adapter';
import { getPayPalSettings } from './paypal.config';
import type { PayPalWebhookEvent } from './types';
import type { WebhookEventHandler } from './webhook-event-handlers';

export interface WebhookResult {
  status: number;
  body: { status: string } | { error: string };
}

export interface WebhookHandlerDependencies {
  api: PayPalApiAdapter;
  events: WebhookEventRepository;
  endpoints: WebhookEndpointRepository;
  handlers?: Record<string, WebhookEventHandler>;
  /** Overrides PAYPAL_WEBHOOK_ID */
  webhookId?: string;
}

function isEventPayload(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === 'string' ? value : '';
}

export class WebhookHandler {
  private api: PayPalApiAdapter;
  private events: WebhookEventRepository;
  private endpoints: WebhookEndpointRepository;
  private handlers = new Map<string, WebhookEventHandler>();
  private configuredWebhookId?: string;

  constructor(deps: WebhookHandlerDependencies) {
    this.api = deps.api;
    this.events = deps.events;
    this.endpoints = deps.endpoints;
    this.configuredWebhookId = deps.webhookId;

    Object.entries(deps.handlers ?? {}).forEach(([eventType, handler]) => {
      this.on(eventType, handler);
    });
  }

  /**
   * Register or replace the handler for an event type
   */
  on(eventType: string, handler: WebhookEventHandler): this {
    this.handlers.set(eventType, handler);
    return this;
  }

  async processWebhook(rawBody: string, headers: WebhookHeaders): Promise<WebhookResult> {
    let parsed: Json;
    try {
      parsed = JSON.parse(rawBody);
    } catch {
      console.error('[WebhookHandler] Invalid JSON in webhook request');
      return { status: 400, body: { error: 'Invalid JSON' } };
    }

    try {
      if (!isEventPayload(parsed) || !stringField(parsed, 'id')) {
        console.warn('[WebhookHandler] Webhook request without event id');
        return { status: 400, body: { error: 'Missing event id' } };
      }

      const eventId = stringField(parsed, 'id');

      if (await this.events.existsByEventId(eventId)) {
        console.warn(`[WebhookHandler] Duplicate webhook event received: ${eventId}`);
        return { status: 200, body: { status: 'already_processed' } };
      }

      if (!(await this.verifySignature(headers, rawBody))) {
        console.warn(`[WebhookHandler] Invalid webhook signature for event: ${eventId}`);
        return { status: 400, body: { error: 'Invalid signature' } };
      }

      const resource: Record<string, unknown> = isEventPayload(parsed.resource)
        ? parsed.resource
        : {};
      const payload: PayPalWebhookEvent = {
        id: eventId,
        event_type: stringField(parsed, 'event_type'),
        resource_type: stringField(parsed, 'resource_type'),
        summary: stringField(parsed, 'summary'),
        resource,
      };

      const event = await this.events.create({
        event_id: eventId,
        event_type: payload.event_type,
        resource_type: stringField(parsed, 'resource_type'),
        resource_id: stringField(resource, 'id') || stringField(parsed, 'resource_id'),
        summary: stringField(parsed, 'summary'),
        raw_data: parsed,
        processed: false,
      });

      await this.dispatch(event, payload);

      console.log(`[WebhookHandler] Successfully processed webhook event: ${eventId}`);
      return { status: 200, body: { status: 'success' } };
    } catch (error) {
      console.error('[WebhookHandler] Error processing webhook:', error);
      return { status: 500, body: { error: 'Internal server error' } };
    }
  }

  /**
   * Run the handler for the event and mark it processed. A failing handler
   * leaves the event unprocessed.
   */
  private async dispatch(event: WebhookEvent, payload: PayPalWebhookEvent): Promise<void> {
    const handler = this.handlers.get(event.event_type);

    try {
      if (handler) {
        await handler(event, payload);
      } else {
        console.log(`[WebhookHandler] Unhandled event type: ${event.event_type}`);
      }

      await this.events.markProcessed(event.id);
    } catch (error) {
      console.error(`[WebhookHandler] Error processing event ${event.event_id}:`, error);
    }
  }

  /**
   * Ask PayPal to verify the delivery. Any failure counts as invalid.
   */
  private async verifySignature(headers: WebhookHeaders, rawBody: string): Promise<boolean> {
    try {
      const webhookId = await this.resolveWebhookId();

      if (!webhookId) {
        console.error('[WebhookHandler] No webhook id configured for signature verification');
        return false;
      }

      const result = await this.api.verifyWebhookSignature(webhookId, headers, rawBody);
      return result.verification_status === 'SUCCESS';
    } catch (error) {
      console.error('[WebhookHandler] Error verifying webhook signature:', error);
      return false;
    }
  }

  private async resolveWebhookId(): Promise<string | undefined> {
    const configured = this.configuredWebhookId ?? getPayPalSettings().webhookId;
    if (configured) {
      return configured;
    }

    const endpoint = await this.endpoints.findLatestActive();
    return endpoint?.webhook_id;
  }
}
