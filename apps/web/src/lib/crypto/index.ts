export {
  encrypt,
  decrypt,
  generateEncryptionKey,
  looksEncrypted,
  ENCRYPTION_KEY_ENV,
} from './encryption';
