/**
 * Payment Service
 *
 * Creates and captures PayPal orders and keeps the local payments ledger
 * (paypal_payments) in step with what PayPal reports.
 */

import type { Payment, PaymentStatus } from '@payhub/database';
import { formatAmount, parseAmount } from '@payhub/shared';
import type { PaymentRepository } from '@/lib/repositories';
import type { PayPalApiAdapter } from './paypal-api.adapter';
import type {
  PayPalCapture,
  PayPalOrder,
  PayPalOrderRequest,
  PayPalRefund,
  PayPalRefundRequest,
  PayPalSubscription,
  PayPalSubscriptionRequest,
} from './types';

const CAPTURABLE_ORDER_STATUSES = ['APPROVED', 'COMPLETED'];

/**
 * Capture details read from a capture response
 */
export interface CaptureDetails {
  captureId: string | null;
  captureStatus: string | null;
  paidAmount: string | null;
  orderReference: string | null;
}

export type CaptureOutcome =
  | { outcome: 'not_approved'; orderStatus: string }
  | { outcome: 'no_payment'; capture: CaptureDetails }
  | { outcome: 'updated'; capture: CaptureDetails; payment: Payment };

/**
 * Ledger status for a capture status reported by PayPal; null leaves the row unchanged
 */
export function mapCaptureStatus(captureStatus: string | null): PaymentStatus | null {
  switch (captureStatus) {
    case 'COMPLETED':
      return 'COMPLETED';
    case 'PENDING':
    case 'DECLINED':
      return 'PENDING';
    default:
      return null;
  }
}

/**
 * Read capture id, status, amount and order reference from a capture response.
 * Falls back to the unit's custom_id and to the response id.
 */
export function extractCaptureDetails(response: PayPalOrder): CaptureDetails {
  const details: CaptureDetails = {
    captureId: null,
    captureStatus: null,
    paidAmount: null,
    orderReference: null,
  };

  const unit = response.purchase_units?.[0];
  if (unit) {
    details.orderReference = unit.custom_id ?? null;

    const capture: PayPalCapture | undefined = unit.payments?.captures?.[0];
    if (capture) {
      details.captureId = capture.id ?? null;
      details.captureStatus = capture.status ?? null;
      details.paidAmount = capture.amount?.value ?? null;
      details.orderReference = capture.custom_id || details.orderReference;
    }
  }

  if (!details.captureId) {
    details.captureId = response.id ?? null;
  }

  return details;
}

export class PaymentService {
  constructor(
    private api: PayPalApiAdapter,
    private payments: PaymentRepository
  ) {}

  /**
   * Create a PayPal order and record it in the ledger as PENDING
   */
  async createOrder(input: PayPalOrderRequest): Promise<PayPalOrder> {
    const order = await this.api.createOrder(input);
    const [unit] = input.purchase_units;

    await this.payments.create({
      paypal_order_id: order.id,
      order_reference: unit?.custom_id ?? null,
      status: 'PENDING',
      amount: parseAmount(unit?.amount.value),
      currency_code: unit?.amount.currency_code ?? null,
    });

    console.log(`[PaymentService] Created PayPal order ${order.id}`);
    return order;
  }

  async getOrder(orderId: string): Promise<PayPalOrder> {
    return this.api.getOrder(orderId);
  }

  /**
   * Capture an approved order and update its ledger row
   */
  async captureOrder(orderId: string): Promise<CaptureOutcome> {
    const order = await this.api.getOrder(orderId);

    if (!CAPTURABLE_ORDER_STATUSES.includes(order.status)) {
      console.warn(`[PaymentService] Order ${orderId} not approved. Current status: ${order.status}`);
      return { outcome: 'not_approved', orderStatus: order.status };
    }

    const response = await this.api.captureOrder(orderId);
    const capture = extractCaptureDetails(response);

    const payment =
      (capture.orderReference
        ? await this.payments.findByOrderReference(capture.orderReference)
        : null) ?? (await this.payments.findByPayPalOrderId(orderId));

    if (!payment) {
      console.warn(
        `[PaymentService] No payment found for reference=${capture.orderReference}, paypal_order_id=${orderId}`
      );
      return { outcome: 'no_payment', capture };
    }

    const status = mapCaptureStatus(capture.captureStatus);
    const paidAmount = parseAmount(capture.paidAmount);

    const updated = await this.payments.update(payment.id, {
      ...(status ? { status } : {}),
      ...(paidAmount !== null ? { paid_amount: paidAmount } : {}),
      ...(capture.captureId ? { capture_id: capture.captureId } : {}),
    });

    console.log(`[PaymentService] Updated payment ${updated.id} to ${updated.status}`);
    return { outcome: 'updated', capture, payment: updated };
  }

  async refundCapture(captureId: string, refund?: PayPalRefundRequest): Promise<PayPalRefund> {
    return this.api.refundCapture(captureId, refund);
  }

  async getCapture(captureId: string): Promise<PayPalCapture> {
    return this.api.getCapture(captureId);
  }

  async createSubscription(input: PayPalSubscriptionRequest): Promise<PayPalSubscription> {
    return this.api.createSubscription(input);
  }

  async getSubscription(subscriptionId: string): Promise<PayPalSubscription> {
    return this.api.getSubscription(subscriptionId);
  }

  async cancelSubscription(subscriptionId: string, reason?: string): Promise<void> {
    await this.api.cancelSubscription(subscriptionId, reason);
  }

  // ============================================================================
  // Ledger updates driven by webhooks
  // ============================================================================

  /**
   * Mark the payment for a completed capture. The row is found by capture id,
   * else by the caller's order reference.
   */
  async markCaptureCompleted(
    captureId: string,
    options: { orderReference?: string | null; paidAmount?: unknown } = {}
  ): Promise<Payment | null> {
    const payment =
      (await this.payments.findByCaptureId(captureId)) ??
      (options.orderReference
        ? await this.payments.findByOrderReference(options.orderReference)
        : null);

    if (!payment) {
      console.warn(`[PaymentService] No payment found for capture ${captureId}`);
      return null;
    }

    const paidAmount = parseAmount(options.paidAmount);
    const updated = await this.payments.update(payment.id, {
      status: 'COMPLETED',
      capture_id: captureId,
      ...(paidAmount !== null ? { paid_amount: paidAmount } : {}),
    });

    const paid =
      updated.paid_amount !== null && updated.currency_code
        ? ` (${formatAmount(updated.paid_amount, updated.currency_code)})`
        : '';
    console.log(`[PaymentService] Payment ${updated.id} completed for capture ${captureId}${paid}`);
    return updated;
  }

  async markCaptureDenied(captureId: string): Promise<Payment | null> {
    return this.setStatusByCapture([captureId], 'DENIED');
  }

  /**
   * Refund events carry the refund id; the capture id sits in related_ids
   */
  async markCaptureRefunded(refundId: string, relatedCaptureId?: string | null): Promise<Payment | null> {
    const candidates = relatedCaptureId ? [refundId, relatedCaptureId] : [refundId];
    return this.setStatusByCapture(candidates, 'REFUNDED');
  }

  private async setStatusByCapture(
    captureIds: string[],
    status: PaymentStatus
  ): Promise<Payment | null> {
    for (const captureId of captureIds) {
      const payment = await this.payments.findByCaptureId(captureId);
      if (payment) {
        const updated = await this.payments.update(payment.id, { status });
        console.log(`[PaymentService] Payment ${updated.id} marked ${status}`);
        return updated;
      }
    }

    console.warn(`[PaymentService] No payment found for capture ${captureIds.join(' / ')}`);
    return null;
  }
}
