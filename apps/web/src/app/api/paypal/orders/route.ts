import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse, readJsonBody } from '@/lib/api/paypal-route';
import { createOrderSchema } from '@/lib/schemas/paypal.schema';

/**
 * POST /api/paypal/orders
 * Create a PayPal order and record it in the payments ledger
 */
export async function POST(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const parsed = createOrderSchema.safeParse(await readJsonBody(request));

    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Validation failed', details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const order = await getPayPalServices().payments.createOrder(parsed.data);
    return NextResponse.json(order, { status: 201 });
  } catch (error) {
    return paypalErrorResponse('POST /api/paypal/orders', error);
  }
}
