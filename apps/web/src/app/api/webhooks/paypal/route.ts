/**
 * POST /api/webhooks/paypal
 *
 * Receives PayPal webhook deliveries. No session auth: each delivery is
 * verified with PayPal using its transmission headers and the raw body.
 *
 * Duplicates are acknowledged with 200 so PayPal stops retrying them.
 */

import { NextRequest, NextResponse } from 'next/server';
import { getPayPalServices } from '@/lib/api/paypal-route';

export const runtime = 'nodejs';

export async function POST(request: NextRequest) {
  try {
    const rawBody = await request.text();
    const { webhookHandler } = getPayPalServices();

    const result = await webhookHandler.processWebhook(rawBody, request.headers);
    return NextResponse.json(result.body, { status: result.status });
  } catch (error) {
    console.error('[PayPal Webhook] Error:', error);
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
  }
}
