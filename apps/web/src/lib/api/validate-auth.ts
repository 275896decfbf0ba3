import { timingSafeEqual } from 'crypto';
import { NextRequest } from 'next/server';
import { createClient } from '@/lib/supabase/server';

const SERVICE_USER_FALLBACK = 'service';

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Validates request authentication via either:
 * 1. API key header (x-api-key) for server-to-server calls
 * 2. Supabase session cookie for browser calls
 *
 * Returns user ID if authenticated, null otherwise.
 */
export async function validateAuth(request: NextRequest): Promise<{ userId: string } | null> {
  const apiKey = request.headers.get('x-api-key');
  const expectedKey = process.env.INTERNAL_API_KEY;

  if (apiKey && expectedKey) {
    if (keysMatch(apiKey, expectedKey)) {
      return { userId: process.env.SERVICE_USER_ID || SERVICE_USER_FALLBACK };
    }
    console.warn('[validateAuth] Invalid x-api-key presented');
    return null;
  }

  // Fall back to cookie-based auth
  const supabase = await createClient();
  const {
    data: { user },
    error,
  } = await supabase.auth.getUser();

  if (error || !user) {
    return null;
  }

  return { userId: user.id };
}
