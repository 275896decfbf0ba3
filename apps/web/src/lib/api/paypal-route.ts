import { NextResponse } from 'next/server';
import { formatConfigLabel, getApiBaseUrl, type PayPalConfig, type PayPalMode } from '@payhub/database';
import { createServiceRoleClient } from '@/lib/supabase/server';
import {
  ConfigurationNotFoundError,
  createPayPalServices,
  PayPalApiException,
  PayPalConfigurationError,
  type PayPalServices,
} from '@/lib/paypal';

/**
 * Configuration as returned by the API. Credentials never leave the server.
 */
export interface PayPalConfigResponse {
  id: string;
  name: string;
  mode: PayPalMode;
  isActive: boolean;
  apiBaseUrl: string;
  label: string;
  createdAt: string;
  updatedAt: string;
}

export function serializeConfig(config: PayPalConfig): PayPalConfigResponse {
  return {
    id: config.id,
    name: config.name,
    mode: config.mode,
    isActive: config.is_active,
    apiBaseUrl: getApiBaseUrl(config.mode),
    label: formatConfigLabel(config),
    createdAt: config.created_at,
    updatedAt: config.updated_at,
  };
}

/**
 * PayPal services over the service-role client. Configuration tables are
 * global, not per user.
 */
export function getPayPalServices(): PayPalServices {
  return createPayPalServices(createServiceRoleClient());
}

export class InvalidJsonBodyError extends Error {
  constructor() {
    super('Invalid JSON');
    this.name = 'InvalidJsonBodyError';
  }
}

/**
 * Map a thrown error to the JSON response for a PayPal route
 */
export function paypalErrorResponse(route: string, error: unknown): NextResponse {
  if (error instanceof InvalidJsonBodyError) {
    console.warn(`[${route}] Rejected malformed JSON body`);
    return NextResponse.json({ error: error.message }, { status: 400 });
  }

  console.error(`[${route}] Error:`, error);

  if (error instanceof ConfigurationNotFoundError) {
    return NextResponse.json({ error: error.message }, { status: 404 });
  }

  if (error instanceof PayPalConfigurationError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }

  if (error instanceof PayPalApiException) {
    return NextResponse.json(
      { error: error.message, details: error.errorResponse },
      { status: 400 }
    );
  }

  return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
}

/**
 * Read a JSON body. An empty body reads as {}; text that does not parse
 * throws InvalidJsonBodyError.
 */
export async function readJsonBody(request: Request): Promise<unknown> {
  const text = await request.text();
  if (!text.trim()) {
    return {};
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidJsonBodyError();
  }
}
