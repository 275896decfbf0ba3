import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  encrypt,
  decrypt,
  generateEncryptionKey,
  looksEncrypted,
} from '../encryption';

describe('Encryption Module', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    process.env.PAYPAL_ENCRYPTION_KEY = 'test-encryption-key';
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('encrypt', () => {
    it('should not contain the plaintext', async () => {
      const encrypted = await encrypt('client-secret-value');

      expect(encrypted).not.toContain('client-secret-value');
      expect(Buffer.from(encrypted, 'base64').length).toBe(48 + 'client-secret-value'.length);
    });

    it('should produce different ciphertext for the same plaintext', async () => {
      const first = await encrypt('same');
      const second = await encrypt('same');

      expect(first).not.toBe(second);
      expect(Buffer.from(first, 'base64').subarray(0, 16)).not.toEqual(
        Buffer.from(second, 'base64').subarray(0, 16)
      );
    });

    it('should throw when the encryption key is not set', async () => {
      delete process.env.PAYPAL_ENCRYPTION_KEY;

      await expect(encrypt('test')).rejects.toThrow(
        'PAYPAL_ENCRYPTION_KEY environment variable is required for credential encryption'
      );
    });
  });

  describe('decrypt', () => {
    it('should restore the plaintext', async () => {
      const encrypted = await encrypt('AbC-client-id');

      await expect(decrypt(encrypted)).resolves.toBe('AbC-client-id');
    });

    it('should restore empty and unicode strings', async () => {
      await expect(decrypt(await encrypt(''))).resolves.toBe('');
      await expect(decrypt(await encrypt('clé secrète ✓'))).resolves.toBe('clé secrète ✓');
    });

    it('should handle PostgreSQL bytea hex-escaped format', async () => {
      const encrypted = await encrypt('hex stored');
      const hexEncoded = '\\x' + Buffer.from(encrypted, 'utf8').toString('hex');

      await expect(decrypt(hexEncoded)).resolves.toBe('hex stored');
    });

    it('should reject tampered ciphertext', async () => {
      const buffer = Buffer.from(await encrypt('test'), 'base64');
      buffer[buffer.length - 1] = buffer[buffer.length - 1] ^ 0xff;

      await expect(decrypt(buffer.toString('base64'))).rejects.toThrow();
    });

    it('should reject values shorter than the header', async () => {
      await expect(decrypt('c2hvcnQ=')).rejects.toThrow('Encrypted value is too short');
    });

    it('should reject a different key', async () => {
      const encrypted = await encrypt('test');
      process.env.PAYPAL_ENCRYPTION_KEY = 'another-key';

      await expect(decrypt(encrypted)).rejects.toThrow();
    });

    it('should throw when the encryption key is not set', async () => {
      const encrypted = await encrypt('test');
      delete process.env.PAYPAL_ENCRYPTION_KEY;

      await expect(decrypt(encrypted)).rejects.toThrow(
        'PAYPAL_ENCRYPTION_KEY environment variable is required'
      );
    });
  });

  describe('generateEncryptionKey', () => {
    it('should return 32 random bytes as base64', () => {
      const key = generateEncryptionKey();

      expect(Buffer.from(key, 'base64')).toHaveLength(32);
      expect(generateEncryptionKey()).not.toBe(key);
    });

    it('should produce a key usable for encryption', async () => {
      process.env.PAYPAL_ENCRYPTION_KEY = generateEncryptionKey();

      await expect(decrypt(await encrypt('value'))).resolves.toBe('value');
    });
  });

  describe('looksEncrypted', () => {
    it('should recognise output of encrypt', async () => {
      expect(looksEncrypted(await encrypt('x'))).toBe(true);
    });

    it('should recognise encrypted values read back as bytea', async () => {
      const hexEncoded = '\\x' + Buffer.from(await encrypt('x'), 'utf8').toString('hex');

      expect(looksEncrypted(hexEncoded)).toBe(true);
    });

    it('should reject bytea-escaped plaintext', () => {
      const hexEncoded = '\\x' + Buffer.from('test-client-id-plaintext', 'utf8').toString('hex');

      expect(looksEncrypted(hexEncoded)).toBe(false);
    });

    it('should reject plaintext credentials', () => {
      expect(looksEncrypted('test-client-id-plaintext')).toBe(false);
      expect(looksEncrypted('short')).toBe(false);
      expect(looksEncrypted('not base64 at all, but long enough to pass the length check!!!!!')).toBe(
        false
      );
    });
  });
});
