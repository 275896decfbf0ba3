import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse, readJsonBody } from '@/lib/api/paypal-route';
import { bulkConfigActiveSchema } from '@/lib/schemas/paypal.schema';

/**
 * PATCH /api/paypal/configs/bulk
 * Activate or deactivate several configurations. Unlike /activate this
 * leaves other configurations alone.
 */
export async function PATCH(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const parsed = bulkConfigActiveSchema.safeParse(await readJsonBody(request));

    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Validation failed', details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const updated = await getPayPalServices().credentials.setActiveFlag(
      parsed.data.ids,
      parsed.data.isActive
    );

    return NextResponse.json({ updated });
  } catch (error) {
    return paypalErrorResponse('PATCH /api/paypal/configs/bulk', error);
  }
}
