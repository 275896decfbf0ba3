import { NextRequest, NextResponse } from 'next/server';
import { validateAuth } from '@/lib/api/validate-auth';
import { getPayPalServices, paypalErrorResponse, readJsonBody, serializeConfig } from '@/lib/api/paypal-route';
import { configQuerySchema, createConfigSchema } from '@/lib/schemas/paypal.schema';

/**
 * GET /api/paypal/configs
 * List PayPal configurations with filtering, ordering and pagination
 */
export async function GET(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const searchParams = request.nextUrl.searchParams;
    const parsed = configQuerySchema.safeParse({
      mode: searchParams.get('mode') || undefined,
      isActive: searchParams.get('isActive') || undefined,
      name: searchParams.get('name') || undefined,
      search: searchParams.get('search') || undefined,
      ordering: searchParams.get('ordering') || undefined,
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
    const result = await getPayPalServices().credentials.listConfigurations(filters, {
      page,
      pageSize,
    });

    return NextResponse.json({ ...result, data: result.data.map(serializeConfig) });
  } catch (error) {
    return paypalErrorResponse('GET /api/paypal/configs', error);
  }
}

/**
 * POST /api/paypal/configs
 * Store a new configuration; credentials are encrypted before they are written
 */
export async function POST(request: NextRequest) {
  try {
    const auth = await validateAuth(request);
    if (!auth) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const parsed = createConfigSchema.safeParse(await readJsonBody(request));

    if (!parsed.success) {
      return NextResponse.json(
        { error: 'Validation failed', details: parsed.error.flatten() },
        { status: 400 }
      );
    }

    const { credentials } = getPayPalServices();

    if (await credentials.hasConfiguration(parsed.data.name)) {
      return NextResponse.json(
        { error: `Configuration '${parsed.data.name}' already exists` },
        { status: 409 }
      );
    }

    const config = await credentials.storeCredentials(parsed.data);
    console.log(`[POST /api/paypal/configs] Created configuration ${config.name} (${config.mode})`);

    return NextResponse.json({ data: serializeConfig(config) }, { status: 201 });
  } catch (error) {
    return paypalErrorResponse('POST /api/paypal/configs', error);
  }
}
