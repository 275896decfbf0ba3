/**
 * Prints a fresh value for PAYPAL_ENCRYPTION_KEY.
 *
 * Usage:
 *   npx tsx scripts/generate-encryption-key.ts
 */

import { generateEncryptionKey } from '../src/lib/crypto';

console.log('🔑 Add this to .env.local:\n');
console.log(`PAYPAL_ENCRYPTION_KEY=${generateEncryptionKey()}`);
console.log('\n⚠️  Changing the key makes stored PayPal credentials unreadable.');
