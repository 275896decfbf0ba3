import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse, readJsonBody } from '@/lib/api/paypal-route';
import { createWebhookEndpointSchema } from '@/lib/schemas/paypal.schema';

/**
 * GET /api/paypal/webhook-endpoints
 * Active endpoints stored locally, or with ?source=paypal the webhooks
 * PayPal has registered for the account
 */
export async function GET(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const { webhookManager } = getPayPalServices();

    if (request.nextUrl.searchParams.get('source') === 'paypal') {
      return NextResponse.json({ data: await webhookManager.listWebhooks() });
    }

    return NextResponse.json({ data: await webhookManager.getWebhookEndpoints() });
  } catch (error) {
    return paypalErrorResponse('GET /api/paypal/webhook-endpoints', error);
  }
}

/**
 * POST /api/paypal/webhook-endpoints
 * Register a webhook with PayPal and remember it locally
 */
export async function POST(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const parsed = createWebhookEndpointSchema.safeParse(await readJsonBody(request));

    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Validation failed', details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const { url, events, name } = parsed.data;
    const webhook = await getPayPalServices().webhookManager.createWebhook(url, events, name);

    return NextResponse.json({ data: webhook }, { status: 201 });
  } catch (error) {
    return paypalErrorResponse('POST /api/paypal/webhook-endpoints', error);
  }
}
