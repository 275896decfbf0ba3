/**
 * PayPal Credentials Setup
 *
 * Stores an encrypted PayPal configuration in Supabase.
 *
 * Usage:
 *   cd apps/web
 *   npx tsx scripts/setup-paypal.ts --client-id <id> --client-secret <secret> \
 *     [--name "Default PayPal Account"] [--mode sandbox|live] [--force]
 *
 * Requirements:
 *   - NEXT_PUBLIC_SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY and
 *     PAYPAL_ENCRYPTION_KEY in .env.local
 */

import * as dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import { runSetupPayPal } from '../src/lib/cli/setup-paypal';
import { PayPalCredentialService } from '../src/lib/paypal/paypal-credential.service';
import { createServiceRoleClient } from '../src/lib/supabase/server';

async function main() {
  const credentials = new PayPalCredentialService(createServiceRoleClient());
  const exitCode = await runSetupPayPal(process.argv.slice(2), credentials);
  process.exit(exitCode);
}

main().catch((error) => {
  console.error('❌ Failed to set up PayPal credentials:', error);
  process.exit(1);
});
