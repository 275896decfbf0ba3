import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse, readJsonBody } from '@/lib/api/paypal-route';
import { createSubscriptionSchema } from '@/lib/schemas/paypal.schema';

/**
 * POST /api/paypal/subscriptions
 */
export async function POST(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const parsed = createSubscriptionSchema.safeParse(await readJsonBody(request));

    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Validation failed', details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const subscription = await getPayPalServices().payments.createSubscription(parsed.data);
    return NextResponse.json(subscription, { status: 201 });
  } catch (error) {
    return paypalErrorResponse('POST /api/paypal/subscriptions', error);
  }
}
