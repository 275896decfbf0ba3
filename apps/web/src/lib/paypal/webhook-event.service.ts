import type { WebhookEvent } from '@payhub/database';
import type {
  PaginatedResult,
  PaginationOptions,
  WebhookEventFilters,
  WebhookEventRepository,
} from '@/lib/repositories';

/**
 * Read access and admin actions over the received webhook event log
 */
export class WebhookEventService {
  constructor(private events: WebhookEventRepository) {}

  async listEvents(
    filters?: WebhookEventFilters,
    pagination?: PaginationOptions
  ): Promise<PaginatedResult<WebhookEvent>> {
    return this.events.findAllFiltered(filters, pagination);
  }

  async getEvent(id: string): Promise<WebhookEvent | null> {
    return this.events.findById(id);
  }

  async setProcessed(ids: string[], processed: boolean): Promise<number> {
    const updated = await this.events.setProcessed(ids, processed);
    console.log(`[WebhookEventService] Marked ${updated} event(s) as ${processed ? 'processed' : 'unprocessed'}`);
    return updated;
  }
}
