import type { SupabaseClient } from '@supabase/supabase-js';
import type { Database } from '@payhub/database';
import {
  PaymentRepository,
  WebhookEndpointRepository,
  WebhookEventRepository,
} from '@/lib/repositories';
import { PayPalApiAdapter, type PayPalApiAdapterOptions } from './paypal-api.adapter';
import { PayPalAuthService } from './paypal-auth.service';
import { PayPalCredentialService } from './paypal-credential.service';
import { PaymentService } from './payment.service';
import { createDefaultEventHandlers } from './webhook-event-handlers';
import { WebhookEventService } from './webhook-event.service';
import { WebhookHandler } from './webhook-handler.service';
import { WebhookManager } from './webhook-manager.service';

export interface PayPalServices {
  credentials: PayPalCredentialService;
  auth: PayPalAuthService;
  api: PayPalApiAdapter;
  payments: PaymentService;
  webhookManager: WebhookManager;
  webhookHandler: WebhookHandler;
  webhookEvents: WebhookEventService;
}

export interface PayPalServicesOptions extends PayPalApiAdapterOptions {
  /** Stored configuration to use; the newest active one by default */
  configName?: string;
}

/**
 * Wire the PayPal services over one Supabase client
 */
export function createPayPalServices(
  supabase: SupabaseClient<Database>,
  options: PayPalServicesOptions = {}
): PayPalServices {
  const { configName, ...adapterOptions } = options;

  const credentials = new PayPalCredentialService(supabase);
  const auth = PayPalAuthService.forConfiguration(credentials, configName);
  const api = new PayPalApiAdapter(auth, adapterOptions);
  const payments = new PaymentService(api, new PaymentRepository(supabase));
  const webhookEndpoints = new WebhookEndpointRepository(supabase);
  const webhookEventRepository = new WebhookEventRepository(supabase);

  return {
    credentials,
    auth,
    api,
    payments,
    webhookManager: new WebhookManager(api, webhookEndpoints),
    webhookHandler: new WebhookHandler({
      api,
      events: webhookEventRepository,
      endpoints: webhookEndpoints,
      handlers: createDefaultEventHandlers(payments),
    }),
    webhookEvents: new WebhookEventService(webhookEventRepository),
  };
}
