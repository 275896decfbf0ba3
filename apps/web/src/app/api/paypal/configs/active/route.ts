import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse, serializeConfig } from '@/lib/api/paypal-route';

/**
 * GET /api/paypal/configs/active
 * The configuration PayPal calls use when none is named
 */
export async function GET(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const config = await getPayPalServices().credentials.getActiveConfiguration();

    if (!config) {
      return NextResponse.json({ error: 'No active configuration found' }, { status: 404 });
    }

    return NextResponse.json({ data: serializeConfig(config) });
  } catch (error) {
    return paypalErrorResponse('GET /api/paypal/configs/active', error);
  }
}
