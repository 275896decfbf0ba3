import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  Database,
  WebhookEvent,
  WebhookEventInsert,
  WebhookEventUpdate,
} from '@payhub/database';
import { BaseRepository, PaginatedResult, PaginationOptions } from './base.repository';

export interface WebhookEventFilters {
  eventType?: string;
  processed?: boolean;
  resourceType?: string;
  search?: string;
}

/**
 * Double-quote a value for a PostgREST or() filter so that commas,
 * parentheses and dots in it stay part of the value
 */
function quoteFilterValue(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

/**
 * Repository for received PayPal webhook events
 */
export class WebhookEventRepository extends BaseRepository<
  WebhookEvent,
  WebhookEventInsert,
  WebhookEventUpdate
> {
  constructor(supabase: SupabaseClient<Database>) {
    super(supabase, 'paypal_webhook_events');
  }

  async existsByEventId(eventId: string): Promise<boolean> {
    const { count, error } = await this.supabase
      .from('paypal_webhook_events')
      .select('*', { count: 'exact', head: true })
      .eq('event_id', eventId);

    if (error) {
      throw new Error(`Failed to check paypal_webhook_events: ${error.message}`);
    }

    return (count ?? 0) > 0;
  }

  async findAllFiltered(
    filters: WebhookEventFilters = {},
    options?: PaginationOptions
  ): Promise<PaginatedResult<WebhookEvent>> {
    const { from, to, page, pageSize } = this.pageBounds(options);

    let query = this.supabase.from('paypal_webhook_events').select('*', { count: 'exact' });

    if (filters.eventType) {
      query = query.eq('event_type', filters.eventType);
    }

    if (filters.processed !== undefined) {
      query = query.eq('processed', filters.processed);
    }

    if (filters.resourceType) {
      query = query.eq('resource_type', filters.resourceType);
    }

    if (filters.search) {
      const term = quoteFilterValue(`%${filters.search}%`);
      query = query.or(
        `event_id.ilike.${term},resource_id.ilike.${term},summary.ilike.${term}`
      );
    }

    const { data, count, error } = await query
      .order('created_at', { ascending: false })
      .range(from, to);

    if (error) {
      throw new Error(`Failed to list paypal_webhook_events: ${error.message}`);
    }

    return this.toPage((data ?? []) as WebhookEvent[], count, page, pageSize);
  }

  async markProcessed(id: string): Promise<WebhookEvent> {
    return this.update(id, { processed: true, processed_at: new Date().toISOString() });
  }

  /**
   * Flip the processed flag on many events, returning the number changed
   */
  async setProcessed(ids: string[], processed: boolean): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }

    const { data, error } = await this.supabase
      .from('paypal_webhook_events')
      .update({
        processed,
        processed_at: processed ? new Date().toISOString() : null,
      })
      .in('id', ids)
      .select('id');

    if (error) {
      throw new Error(`Failed to update paypal_webhook_events: ${error.message}`);
    }

    return ((data ?? []) as Array<{ id: string }>).length;
  }
}
