/**
 * Cryptographic Utilities
 *
 * AES-256-GCM encryption for OAuth tokens stored at rest.
 */

import crypto from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // 96 bits for GCM
const KEY_LENGTH = 32;

/**
 * Symmetric cipher bound to one key
 */
export interface TokenCipher {
  /** Returns `iv:authTag:ciphertext`, hex encoded */
  encrypt(plaintext: string): string;
  /** Throws if the data was tampered with or encrypted under another key */
  decrypt(encryptedData: string): string;
}

/**
 * Create a cipher from a 64-character hex key
 */
export function createTokenCipher(keyHex: string): TokenCipher {
  const key = Buffer.from(keyHex, 'hex');
  if (key.length !== KEY_LENGTH) {
    throw new Error(`Encryption key must be ${KEY_LENGTH} bytes (64 hex characters)`);
  }

  return {
    encrypt(plaintext: string): string {
      const iv = crypto.randomBytes(IV_LENGTH);
      const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

      let encrypted = cipher.update(plaintext, 'utf8', 'hex');
      encrypted += cipher.final('hex');

      const authTag = cipher.getAuthTag().toString('hex');

      return `${iv.toString('hex')}:${authTag}:${encrypted}`;
    },

    decrypt(encryptedData: string): string {
      const parts = encryptedData.split(':');
      if (parts.length !== 3) {
        throw new Error('Invalid encrypted data format');
      }

      const [ivHex, authTagHex, ciphertext] = parts;

      const decipher = crypto.createDecipheriv(ALGORITHM, key, Buffer.from(ivHex, 'hex'));
      decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));

      let decrypted = decipher.update(ciphertext, 'hex', 'utf8');
      decrypted += decipher.final('utf8');

      return decrypted;
    },
  };
}

/**
 * Check if a string has the shape produced by `encrypt`
 */
export function isEncrypted(value: string): boolean {
  if (!value) return false;
  const parts = value.split(':');
  return parts.length === 3 && parts[0].length === IV_LENGTH * 2;
}
