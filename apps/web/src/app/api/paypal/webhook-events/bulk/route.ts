import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse, readJsonBody } from '@/lib/api/paypal-route';
import { bulkWebhookEventSchema } from '@/lib/schemas/paypal.schema';

/**
 * PATCH /api/paypal/webhook-events/bulk
 * Mark events processed or unprocessed
 */
export async function PATCH(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const parsed = bulkWebhookEventSchema.safeParse(await readJsonBody(request));

    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Validation failed', details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const updated = await getPayPalServices().webhookEvents.setProcessed(
      parsed.data.ids,
      parsed.data.processed
    );

    return NextResponse.json({ updated });
  } catch (error) {
    return paypalErrorResponse('PATCH /api/paypal/webhook-events/bulk', error);
  }
}
