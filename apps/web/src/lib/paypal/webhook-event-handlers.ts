import type { WebhookEvent } from '@payhub/database';
import type { PaymentService } from './payment.service';
import type { PayPalWebhookEvent } from './types';

export type WebhookEventHandler = (
  event: WebhookEvent,
  payload: PayPalWebhookEvent
) => Promise<void>;

type Resource = Record<string, unknown>;

function isResource(value: unknown): value is Resource {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Resource {
  return isResource(value) ? value : {};
}

function asString(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * custom_id on the capture itself, else on any purchase unit
 */
function findCustomId(resource: Resource): string | null {
  const direct = asString(resource.custom_id);
  if (direct) {
    return direct;
  }

  const units = Array.isArray(resource.purchase_units) ? resource.purchase_units : [];
  let customId: string | null = null;
  for (const unit of units) {
    customId = asString(asRecord(unit).custom_id) ?? customId;
  }
  return customId;
}

function logEvent(label: string): WebhookEventHandler {
  return async (event) => {
    console.log(`[WebhookHandler] ${label}: ${event.resource_id}`);
  };
}

/**
 * Handlers registered on every WebhookHandler
 */
export function createDefaultEventHandlers(
  payments: PaymentService
): Record<string, WebhookEventHandler> {
  return {
    'PAYMENT.CAPTURE.COMPLETED': async (event, payload) => {
      const resource = asRecord(payload.resource);
      const captureId = asString(resource.id) ?? event.resource_id;
      const amount = asRecord(resource.amount);

      await payments.markCaptureCompleted(captureId, {
        orderReference: findCustomId(resource),
        paidAmount: amount.value ?? amount.total,
      });
    },

    'PAYMENT.CAPTURE.DENIED': async (event, payload) => {
      const captureId = asString(asRecord(payload.resource).id) ?? event.resource_id;
      await payments.markCaptureDenied(captureId);
    },

    'PAYMENT.CAPTURE.REFUNDED': async (event, payload) => {
      const resource = asRecord(payload.resource);
      const refundId = asString(resource.id) ?? event.resource_id;
      const relatedIds = asRecord(asRecord(resource.supplementary_data).related_ids);

      await payments.markCaptureRefunded(refundId, asString(relatedIds.capture_id));
    },

    'CHECKOUT.ORDER.COMPLETED': logEvent('Order completed'),
    'BILLING.SUBSCRIPTION.ACTIVATED': logEvent('Subscription activated'),
    'BILLING.SUBSCRIPTION.CANCELLED': logEvent('Subscription cancelled'),
  };
}
