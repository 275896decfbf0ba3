import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { Database } from '@payhub/database';
import { WebhookEndpointRepository, WebhookEventRepository } from '@/lib/repositories';
import { WebhookHandler } from '../webhook-handler.service';
import type { PayPalApiAdapter } from '../paypal-api.adapter';
import { createMockSupabaseClient, MockSupabaseClient } from '../../../test/mocks/supabase';

const headers = {
  'paypal-auth-algo': 'SHA256withRSA',
  'paypal-cert-url': 'https://api.sandbox.paypal.com/cert.pem',
  'paypal-transmission-id': 'tx-1',
  'paypal-transmission-sig': 'sig',
  'paypal-transmission-time': '2026-01-01T00:00:00Z',
};

const captureEvent = {
  id: 'WH-EVT-1',
  event_type: 'PAYMENT.CAPTURE.COMPLETED',
  resource_type: 'capture',
  summary: 'Payment completed for $ 10.00 USD',
  resource: { id: 'CAP-1', amount: { value: '10.00', currency_code: 'USD' } },
};

describe('WebhookHandler', () => {
  let mockSupabase: MockSupabaseClient;
  let events: WebhookEventRepository;
  let endpoints: WebhookEndpointRepository;
  const mockApi = { verifyWebhookSignature: vi.fn() };

  function createHandler(webhookId: string | null = 'WH-CONFIGURED') {
    return new WebhookHandler({
      api: mockApi as unknown as PayPalApiAdapter,
      events,
      endpoints,
      webhookId: webhookId ?? undefined,
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    delete process.env.PAYPAL_WEBHOOK_ID;

    mockSupabase = createMockSupabaseClient();
    const client = mockSupabase as unknown as SupabaseClient<Database>;
    events = new WebhookEventRepository(client);
    endpoints = new WebhookEndpointRepository(client);
    mockApi.verifyWebhookSignature.mockResolvedValue({ verification_status: 'SUCCESS' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reject a body that is not JSON', async () => {
    const result = await createHandler().processWebhook('not json', headers);

    expect(result).toEqual({ status: 400, body: { error: 'Invalid JSON' } });
    expect(mockApi.verifyWebhookSignature).not.toHaveBeenCalled();
  });

  it('should reject an event without an id', async () => {
    const result = await createHandler().processWebhook(
      JSON.stringify({ event_type: 'PAYMENT.CAPTURE.COMPLETED' }),
      headers
    );

    expect(result).toEqual({ status: 400, body: { error: 'Missing event id' } });
  });

  it('should acknowledge a duplicate without verifying it again', async () => {
    mockSupabase._setMockData('paypal_webhook_events', [
      {
        id: 'evt-row-1',
        event_id: 'WH-EVT-1',
        event_type: 'PAYMENT.CAPTURE.COMPLETED',
        processed: true,
      },
    ]);

    const result = await createHandler().processWebhook(JSON.stringify(captureEvent), headers);

    expect(result).toEqual({ status: 200, body: { status: 'already_processed' } });
    expect(mockApi.verifyWebhookSignature).not.toHaveBeenCalled();
    expect(mockSupabase._mockData.paypal_webhook_events).toHaveLength(1);
  });

  it('should reject a delivery PayPal does not verify', async () => {
    mockApi.verifyWebhookSignature.mockResolvedValueOnce({ verification_status: 'FAILURE' });

    const result = await createHandler().processWebhook(JSON.stringify(captureEvent), headers);

    expect(result).toEqual({ status: 400, body: { error: 'Invalid signature' } });
    expect(mockSupabase._mockData.paypal_webhook_events).toHaveLength(0);
  });

  it('should treat a verification error as an invalid signature', async () => {
    mockApi.verifyWebhookSignature.mockRejectedValueOnce(new Error('network down'));

    const result = await createHandler().processWebhook(JSON.stringify(captureEvent), headers);

    expect(result).toEqual({ status: 400, body: { error: 'Invalid signature' } });
  });

  it('should reject when no webhook id is known', async () => {
    const result = await createHandler(null).processWebhook(
      JSON.stringify(captureEvent),
      headers
    );

    expect(result).toEqual({ status: 400, body: { error: 'Invalid signature' } });
    expect(mockApi.verifyWebhookSignature).not.toHaveBeenCalled();
  });

  it('should verify against the configured webhook id with the raw body', async () => {
    const body = JSON.stringify(captureEvent);

    await createHandler().processWebhook(body, headers);

    expect(mockApi.verifyWebhookSignature).toHaveBeenCalledWith('WH-CONFIGURED', headers, body);
  });

  it('should read the webhook id from the environment', async () => {
    process.env.PAYPAL_WEBHOOK_ID = 'WH-ENV';

    await createHandler(null).processWebhook(JSON.stringify(captureEvent), headers);

    expect(mockApi.verifyWebhookSignature.mock.calls[0][0]).toBe('WH-ENV');
    delete process.env.PAYPAL_WEBHOOK_ID;
  });

  it('should fall back to the newest active endpoint', async () => {
    mockSupabase._setMockData('paypal_webhook_endpoints', [
      {
        id: 'ep-1',
        name: 'Old',
        url: 'https://example.com/old',
        events: [],
        webhook_id: 'WH-OLD',
        is_active: true,
        created_at: '2026-01-01T00:00:00Z',
      },
      {
        id: 'ep-2',
        name: 'New',
        url: 'https://example.com/new',
        events: [],
        webhook_id: 'WH-NEW',
        is_active: true,
        created_at: '2026-02-01T00:00:00Z',
      },
      {
        id: 'ep-3',
        name: 'Inactive',
        url: 'https://example.com/inactive',
        events: [],
        webhook_id: 'WH-INACTIVE',
        is_active: false,
        created_at: '2026-03-01T00:00:00Z',
      },
    ]);

    await createHandler(null).processWebhook(JSON.stringify(captureEvent), headers);

    expect(mockApi.verifyWebhookSignature.mock.calls[0][0]).toBe('WH-NEW');
  });

  it('should store the event and mark it processed', async () => {
    const handler = vi.fn().mockResolvedValue(undefined);

    const result = await createHandler()
      .on('PAYMENT.CAPTURE.COMPLETED', handler)
      .processWebhook(JSON.stringify(captureEvent), headers);

    expect(result).toEqual({ status: 200, body: { status: 'success' } });
    const [stored] = mockSupabase._mockData.paypal_webhook_events;
    expect(stored).toMatchObject({
      event_id: 'WH-EVT-1',
      event_type: 'PAYMENT.CAPTURE.COMPLETED',
      resource_type: 'capture',
      resource_id: 'CAP-1',
      summary: 'Payment completed for $ 10.00 USD',
      raw_data: captureEvent,
      processed: true,
    });
    expect(typeof stored.processed_at).toBe('string');
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][1]).toEqual(captureEvent);
  });

  it('should mark events without a handler as processed', async () => {
    const result = await createHandler().processWebhook(
      JSON.stringify({ ...captureEvent, event_type: 'CUSTOMER.DISPUTE.CREATED' }),
      headers
    );

    expect(result.status).toBe(200);
    expect(mockSupabase._mockData.paypal_webhook_events[0].processed).toBe(true);
  });

  it('should take resource_id from the top level when the resource has no id', async () => {
    await createHandler().processWebhook(
      JSON.stringify({ id: 'WH-EVT-2', event_type: 'X', resource_id: 'RES-9', resource: {} }),
      headers
    );

    expect(mockSupabase._mockData.paypal_webhook_events[0].resource_id).toBe('RES-9');
  });

  it('should leave the event unprocessed when its handler fails', async () => {
    const result = await createHandler()
      .on('PAYMENT.CAPTURE.COMPLETED', vi.fn().mockRejectedValue(new Error('boom')))
      .processWebhook(JSON.stringify(captureEvent), headers);

    expect(result).toEqual({ status: 200, body: { status: 'success' } });
    expect(mockSupabase._mockData.paypal_webhook_events[0]).toMatchObject({
      event_id: 'WH-EVT-1',
      processed: false,
    });
  });

  it('should let on() replace a handler given at construction', async () => {
    const original = vi.fn().mockResolvedValue(undefined);
    const replacement = vi.fn().mockResolvedValue(undefined);
    const handler = new WebhookHandler({
      api: mockApi as unknown as PayPalApiAdapter,
      events,
      endpoints,
      webhookId: 'WH-CONFIGURED',
      handlers: { 'PAYMENT.CAPTURE.COMPLETED': original },
    });

    await handler
      .on('PAYMENT.CAPTURE.COMPLETED', replacement)
      .processWebhook(JSON.stringify(captureEvent), headers);

    expect(original).not.toHaveBeenCalled();
    expect(replacement).toHaveBeenCalledTimes(1);
  });

  it('should return 500 when the event cannot be stored', async () => {
    vi.spyOn(events, 'create').mockRejectedValueOnce(new Error('db down'));

    const result = await createHandler().processWebhook(JSON.stringify(captureEvent), headers);

    expect(result).toEqual({ status: 500, body: { error: 'Internal server error' } });
  });
});
