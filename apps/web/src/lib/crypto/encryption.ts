/**
 * AES-256-GCM encryption for PayPal credentials at rest.
 *
 * A stored value is base64(salt | iv | authTag | ciphertext); the key is
 * derived per value with scrypt from PAYPAL_ENCRYPTION_KEY. Values read back
 * from a bytea column arrive hex-escaped (`\x...`) and are unwrapped first.
 */

import { createCipheriv, createDecipheriv, randomBytes, scrypt } from 'crypto';
import { promisify } from 'util';

const scryptAsync = promisify(scrypt);

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
const HEADER_LENGTH = SALT_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH;
const BYTEA_PREFIX = '\\x';

export const ENCRYPTION_KEY_ENV = 'PAYPAL_ENCRYPTION_KEY';

interface SealedCredential {
  salt: Buffer;
  iv: Buffer;
  authTag: Buffer;
  ciphertext: Buffer;
}

async function deriveKey(salt: Buffer): Promise<Buffer> {
  const passphrase = process.env[ENCRYPTION_KEY_ENV];
  if (!passphrase) {
    throw new Error(`${ENCRYPTION_KEY_ENV} environment variable is required for credential encryption`);
  }

  return (await scryptAsync(passphrase, salt, KEY_LENGTH)) as Buffer;
}

/**
 * The base64 text of a stored value, with any bytea hex escaping removed
 */
function unwrapStoredValue(stored: string): string {
  if (stored.startsWith(BYTEA_PREFIX)) {
    return Buffer.from(stored.slice(BYTEA_PREFIX.length), 'hex').toString('utf8');
  }
  return stored;
}

function unseal(stored: string): SealedCredential {
  const bytes = Buffer.from(unwrapStoredValue(stored), 'base64');
  if (bytes.length < HEADER_LENGTH) {
    throw new Error('Encrypted value is too short');
  }

  const ivStart = SALT_LENGTH;
  const tagStart = ivStart + IV_LENGTH;

  return {
    salt: bytes.subarray(0, ivStart),
    iv: bytes.subarray(ivStart, tagStart),
    authTag: bytes.subarray(tagStart, HEADER_LENGTH),
    ciphertext: bytes.subarray(HEADER_LENGTH),
  };
}

/**
 * Encrypt a credential for storage
 */
export async function encrypt(plaintext: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, await deriveKey(salt), iv);

  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

  return Buffer.concat([salt, iv, cipher.getAuthTag(), ciphertext]).toString('base64');
}

/**
 * Decrypt a stored credential, plain base64 or bytea hex-escaped
 */
export async function decrypt(stored: string): Promise<string> {
  const { salt, iv, authTag, ciphertext } = unseal(stored);

  const decipher = createDecipheriv(ALGORITHM, await deriveKey(salt), iv);
  decipher.setAuthTag(authTag);

  return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
}

/**
 * Generate a random passphrase suitable for PAYPAL_ENCRYPTION_KEY
 */
export function generateEncryptionKey(): string {
  return randomBytes(KEY_LENGTH).toString('base64');
}

/**
 * Whether a stored value has the shape encrypt() produces. Plaintext
 * credentials inserted by hand fail this check.
 */
export function looksEncrypted(stored: string): boolean {
  const base64 = unwrapStoredValue(stored);
  if (base64.length < 64 || !/^[A-Za-z0-9+/]+={0,2}$/.test(base64)) {
    return false;
  }
  return Buffer.from(base64, 'base64').length >= HEADER_LENGTH;
}
