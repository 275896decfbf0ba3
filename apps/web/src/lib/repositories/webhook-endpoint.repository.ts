import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  Database,
  WebhookEndpoint,
  WebhookEndpointInsert,
  WebhookEndpointUpdate,
} from '@payhub/database';
import { BaseRepository } from './base.repository';

/**
 * Repository for webhook endpoints registered with PayPal
 */
export class WebhookEndpointRepository extends BaseRepository<
  WebhookEndpoint,
  WebhookEndpointInsert,
  WebhookEndpointUpdate
> {
  constructor(supabase: SupabaseClient<Database>) {
    super(supabase, 'paypal_webhook_endpoints');
  }

  async findActive(): Promise<WebhookEndpoint[]> {
    const { data, error } = await this.supabase
      .from('paypal_webhook_endpoints')
      .select('*')
      .eq('is_active', true)
      .order('created_at', { ascending: false });

    if (error) {
      throw new Error(`Failed to find active paypal_webhook_endpoints: ${error.message}`);
    }

    return (data ?? []) as WebhookEndpoint[];
  }

  async findLatestActive(): Promise<WebhookEndpoint | null> {
    const endpoints = await this.findActive();
    return endpoints[0] ?? null;
  }

  async deleteByWebhookId(webhookId: string): Promise<void> {
    const { error } = await this.supabase
      .from('paypal_webhook_endpoints')
      .delete()
      .eq('webhook_id', webhookId);

    if (error) {
      throw new Error(`Failed to delete paypal_webhook_endpoints: ${error.message}`);
    }
  }

  /**
   * Replace the subscribed event names; null when no endpoint has this id
   */
  async updateEventsByWebhookId(
    webhookId: string,
    events: string[]
  ): Promise<WebhookEndpoint | null> {
    const { data, error } = await this.supabase
      .from('paypal_webhook_endpoints')
      .update({ events })
      .eq('webhook_id', webhookId)
      .select()
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to update paypal_webhook_endpoints: ${error.message}`);
    }

    return (data as WebhookEndpoint | null) ?? null;
  }
}
