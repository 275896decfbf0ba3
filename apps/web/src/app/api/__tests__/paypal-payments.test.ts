/**
 * Tests for PayPal order, payment and subscription routes
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NextRequest } from 'next/server';
import { PayPalApiException, PayPalConfigurationError } from '@/lib/paypal';

vi.mock('@/lib/supabase/server', () => ({
  createClient: vi.fn(),
  createServiceRoleClient: vi.fn(),
}));

vi.mock('@/lib/api/validate-auth', () => ({
  validateAuth: vi.fn(),
}));

vi.mock('@/lib/api/paypal-route', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@/lib/api/paypal-route')>()),
  getPayPalServices: vi.fn(),
}));

vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});

import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices } from '@/lib/api/paypal-route';
import { POST as createOrder } from '../paypal/orders/route';
import { GET as getOrder } from '../paypal/orders/[orderId]/route';
import { POST as captureOrder } from '../paypal/orders/[orderId]/capture/route';
import { GET as getPayment } from '../paypal/payments/[paymentId]/route';
import { POST as refundPayment } from '../paypal/payments/[paymentId]/refund/route';
import { POST as createSubscription } from '../paypal/subscriptions/route';
import { GET as getSubscription } from '../paypal/subscriptions/[subscriptionId]/route';
import { POST as cancelSubscription } from '../paypal/subscriptions/[subscriptionId]/cancel/route';

const payments = {
  createOrder: vi.fn(),
  getOrder: vi.fn(),
  captureOrder: vi.fn(),
  getCapture: vi.fn(),
  refundCapture: vi.fn(),
  createSubscription: vi.fn(),
  getSubscription: vi.fn(),
  cancelSubscription: vi.fn(),
};

function postJson(url: string, body: unknown) {
  return new NextRequest(url, {
    method: 'POST',
    body: JSON.stringify(body),
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('PayPal payment routes', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(validateAuth).mockResolvedValue({ userId: 'user-123' });
    vi.mocked(getPayPalServices).mockReturnValue({ payments } as never);
  });

  describe('POST /api/paypal/orders', () => {
    it('should return 401 when not authenticated', async () => {
      vi.mocked(validateAuth).mockResolvedValue(null);

      const response = await createOrder(postJson('http://localhost:3000/api/paypal/orders', {}));

      expect(response.status).toBe(401);
    });

    it('should create the order with the default intent', async () => {
      payments.createOrder.mockResolvedValue({ id: 'ORDER-1', status: 'CREATED' });

      const response = await createOrder(
        postJson('http://localhost:3000/api/paypal/orders', {
          purchase_units: [{ custom_id: 'INV-1', amount: { currency_code: 'USD', value: '10.00' } }],
        })
      );

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({ id: 'ORDER-1', status: 'CREATED' });
      expect(payments.createOrder).toHaveBeenCalledWith({
        intent: 'CAPTURE',
        purchase_units: [{ custom_id: 'INV-1', amount: { currency_code: 'USD', value: '10.00' } }],
      });
    });

    it('should return 400 without purchase units', async () => {
      const response = await createOrder(
        postJson('http://localhost:3000/api/paypal/orders', { intent: 'CAPTURE' })
      );

      expect(response.status).toBe(400);
      expect((await response.json()).error).toBe('Validation failed');
      expect(payments.createOrder).not.toHaveBeenCalled();
    });

    it('should return 400 with the PayPal error', async () => {
      payments.createOrder.mockRejectedValue(
        new PayPalApiException('Request is not well-formed', 400, {
          name: 'INVALID_REQUEST',
          message: 'Request is not well-formed',
        })
      );

      const response = await createOrder(
        postJson('http://localhost:3000/api/paypal/orders', {
          purchase_units: [{ amount: { currency_code: 'USD', value: '10.00' } }],
        })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Request is not well-formed',
        details: { name: 'INVALID_REQUEST', message: 'Request is not well-formed' },
      });
    });

    it('should return 400 when no configuration is active', async () => {
      payments.createOrder.mockRejectedValue(new PayPalConfigurationError());

      const response = await createOrder(
        postJson('http://localhost:3000/api/paypal/orders', {
          purchase_units: [{ amount: { currency_code: 'USD', value: '10.00' } }],
        })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'No active PayPal configuration found.' });
    });

    it('should return 500 for unexpected errors', async () => {
      payments.createOrder.mockRejectedValue(new Error('db down'));

      const response = await createOrder(
        postJson('http://localhost:3000/api/paypal/orders', {
          purchase_units: [{ amount: { currency_code: 'USD', value: '10.00' } }],
        })
      );

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: 'Internal server error' });
    });
  });

  describe('GET /api/paypal/orders/[orderId]', () => {
    it('should return the PayPal order', async () => {
      payments.getOrder.mockResolvedValue({ id: 'ORDER-1', status: 'APPROVED' });

      const response = await getOrder(
        new NextRequest('http://localhost:3000/api/paypal/orders/ORDER-1'),
        { params: Promise.resolve({ orderId: 'ORDER-1' }) }
      );

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ id: 'ORDER-1', status: 'APPROVED' });
      expect(payments.getOrder).toHaveBeenCalledWith('ORDER-1');
    });
  });

  describe('POST /api/paypal/orders/[orderId]/capture', () => {
    it('should answer OK after a capture', async () => {
      payments.captureOrder.mockResolvedValue({ outcome: 'updated' });

      const response = await captureOrder(
        new NextRequest('http://localhost:3000/api/paypal/orders/ORDER-1/capture', {
          method: 'POST',
        }),
        { params: Promise.resolve({ orderId: 'ORDER-1' }) }
      );

      expect(response.status).toBe(200);
      expect(await response.text()).toBe('OK');
      expect(payments.captureOrder).toHaveBeenCalledWith('ORDER-1');
    });

    it('should answer OK when the capture fails', async () => {
      payments.captureOrder.mockRejectedValue(new PayPalApiException('Order already captured', 422));

      const response = await captureOrder(
        new NextRequest('http://localhost:3000/api/paypal/orders/ORDER-1/capture', {
          method: 'POST',
        }),
        { params: Promise.resolve({ orderId: 'ORDER-1' }) }
      );

      expect(response.status).toBe(200);
      expect(await response.text()).toBe('OK');
    });
  });

  describe('payments', () => {
    it('should return capture details', async () => {
      payments.getCapture.mockResolvedValue({ id: 'CAP-1', status: 'COMPLETED' });

      const response = await getPayment(
        new NextRequest('http://localhost:3000/api/paypal/payments/CAP-1'),
        { params: Promise.resolve({ paymentId: 'CAP-1' }) }
      );

      expect(await response.json()).toEqual({ id: 'CAP-1', status: 'COMPLETED' });
    });

    it('should refund with an empty body', async () => {
      payments.refundCapture.mockResolvedValue({ id: 'REF-1', status: 'COMPLETED' });

      const response = await refundPayment(
        new NextRequest('http://localhost:3000/api/paypal/payments/CAP-1/refund', {
          method: 'POST',
        }),
        { params: Promise.resolve({ paymentId: 'CAP-1' }) }
      );

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ id: 'REF-1', status: 'COMPLETED' });
      expect(payments.refundCapture).toHaveBeenCalledWith('CAP-1', {});
    });

    it('should pass a partial refund amount', async () => {
      payments.refundCapture.mockResolvedValue({ id: 'REF-2', status: 'COMPLETED' });

      await refundPayment(
        postJson('http://localhost:3000/api/paypal/payments/CAP-1/refund', {
          amount: { currency_code: 'USD', value: '2.50' },
        }),
        { params: Promise.resolve({ paymentId: 'CAP-1' }) }
      );

      expect(payments.refundCapture).toHaveBeenCalledWith('CAP-1', {
        amount: { currency_code: 'USD', value: '2.50' },
      });
    });

    it('should return 400 for a malformed refund body', async () => {
      const response = await refundPayment(
        new NextRequest('http://localhost:3000/api/paypal/payments/CAP-1/refund', {
          method: 'POST',
          body: '{"amount":{"currency_code":"USD","value":"5.00"},}',
          headers: { 'Content-Type': 'application/json' },
        }),
        { params: Promise.resolve({ paymentId: 'CAP-1' }) }
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid JSON' });
      expect(payments.refundCapture).not.toHaveBeenCalled();
    });
  });

  describe('subscriptions', () => {
    it('should create a subscription', async () => {
      payments.createSubscription.mockResolvedValue({ id: 'I-SUB1', status: 'APPROVAL_PENDING' });

      const response = await createSubscription(
        postJson('http://localhost:3000/api/paypal/subscriptions', { plan_id: 'P-1' })
      );

      expect(response.status).toBe(201);
      expect(payments.createSubscription).toHaveBeenCalledWith({ plan_id: 'P-1' });
    });

    it('should require a plan id', async () => {
      const response = await createSubscription(
        postJson('http://localhost:3000/api/paypal/subscriptions', {})
      );

      expect(response.status).toBe(400);
    });

    it('should return a subscription', async () => {
      payments.getSubscription.mockResolvedValue({ id: 'I-SUB1', status: 'ACTIVE' });

      const response = await getSubscription(
        new NextRequest('http://localhost:3000/api/paypal/subscriptions/I-SUB1'),
        { params: Promise.resolve({ subscriptionId: 'I-SUB1' }) }
      );

      expect(await response.json()).toEqual({ id: 'I-SUB1', status: 'ACTIVE' });
    });

    it('should cancel with a reason', async () => {
      payments.cancelSubscription.mockResolvedValue(undefined);

      const response = await cancelSubscription(
        postJson('http://localhost:3000/api/paypal/subscriptions/I-SUB1/cancel', {
          reason: 'Customer request',
        }),
        { params: Promise.resolve({ subscriptionId: 'I-SUB1' }) }
      );

      expect(await response.json()).toEqual({ success: true });
      expect(payments.cancelSubscription).toHaveBeenCalledWith('I-SUB1', 'Customer request');
    });

    it('should return 400 for a malformed cancel body', async () => {
      const response = await cancelSubscription(
        new NextRequest('http://localhost:3000/api/paypal/subscriptions/I-SUB1/cancel', {
          method: 'POST',
          body: '{"reason":',
        }),
        { params: Promise.resolve({ subscriptionId: 'I-SUB1' }) }
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid JSON' });
      expect(payments.cancelSubscription).not.toHaveBeenCalled();
    });

    it('should return 400 when PayPal refuses the cancellation', async () => {
      payments.cancelSubscription.mockRejectedValue(
        new PayPalApiException('Subscription status is invalid', 422)
      );

      const response = await cancelSubscription(
        new NextRequest('http://localhost:3000/api/paypal/subscriptions/I-SUB1/cancel', {
          method: 'POST',
        }),
        { params: Promise.resolve({ subscriptionId: 'I-SUB1' }) }
      );

      expect(response.status).toBe(400);
      expect((await response.json()).error).toBe('Subscription status is invalid');
      expect(payments.cancelSubscription).toHaveBeenCalledWith('I-SUB1', undefined);
    });
  });
});
