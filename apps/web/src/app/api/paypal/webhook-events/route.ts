import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse } from '@/lib/api/paypal-route';
import { webhookEventQuerySchema } from '@/lib/schemas/paypal.schema';

/**
 * GET /api/paypal/webhook-events
 * Received webhook events, newest first
 */
export async function GET(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const searchParams = request.nextUrl.searchParams;
    const parsed = webhookEventQuerySchema.safeParse({
      eventType: searchParams.get('eventType') || undefined,
      processed: searchParams.get('processed') || undefined,
      resourceType: searchParams.get('resourceType') || undefined,
      search: searchParams.get('search') || undefined,
      page: searchParams.get('page') || undefined,
      pageSize: searchParams.get('pageSize') || undefined,
    });

    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Validation failed', details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const { page, pageSize, ...filters } = parsed.data;
    const result = await getPayPalServices().webhookEvents.listEvents(filters, { page, pageSize });

    return NextResponse.json(result);
  } catch (error) {
    return paypalErrorResponse('GET /api/paypal/webhook-events', error);
  }
}
