/**
 * Webhook Manager
 *
 * Registers webhook listeners with PayPal and mirrors them in
 * paypal_webhook_endpoints.
 */

import type { WebhookEndpoint } from '@payhub/database';
import type { WebhookEndpointRepository } from '@/lib/repositories';
import type { PayPalApiAdapter } from './paypal-api.adapter';
import type { PayPalWebhook } from './types';

export class WebhookManager {
  constructor(
    private api: PayPalApiAdapter,
    private endpoints: WebhookEndpointRepository
  ) {}

  async createWebhook(url: string, events: string[], name?: string): Promise<PayPalWebhook> {
    try {
      const webhook = await this.api.createWebhook({
        url,
        event_types: events.map((event) => ({ name: event })),
      });

      const endpoint = await this.endpoints.create({
        name: name || `Webhook for ${url}`,
        url,
        events,
        webhook_id: webhook.id,
        is_active: true,
      });

      console.log(`[WebhookManager] Created webhook: ${endpoint.name} with ID: ${endpoint.webhook_id}`);
      return webhook;
    } catch (error) {
      console.error('[WebhookManager] Failed to create webhook:', error);
      throw error;
    }
  }

  /**
   * Webhooks registered with PayPal for the active credentials
   */
  async listWebhooks(): Promise<PayPalWebhook[]> {
    const response = await this.api.listWebhooks();
    return response.webhooks ?? [];
  }

  async deleteWebhook(webhookId: string): Promise<boolean> {
    try {
      await this.api.deleteWebhook(webhookId);
      await this.endpoints.deleteByWebhookId(webhookId);

      console.log(`[WebhookManager] Deleted webhook: ${webhookId}`);
      return true;
    } catch (error) {
      console.error(`[WebhookManager] Failed to delete webhook ${webhookId}:`, error);
      throw error;
    }
  }

  async getWebhookEndpoints(): Promise<WebhookEndpoint[]> {
    return this.endpoints.findActive();
  }

  /**
   * Replace the locally recorded event list; false when the webhook is unknown
   */
  async updateWebhookEvents(webhookId: string, events: string[]): Promise<boolean> {
    const endpoint = await this.endpoints.updateEventsByWebhookId(webhookId, events);

    if (!endpoint) {
      console.error(`[WebhookManager] Webhook endpoint not found: ${webhookId}`);
      return false;
    }

    return true;
  }
}
