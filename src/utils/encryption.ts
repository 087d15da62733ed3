import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
// Fixed salt; ENCRYPTION_SECRET must be unique per deployment
const SALT = 'hostkeeper-credentials';

let encryptionKeyCache: Buffer | null = null;

function getEncryptionKey(): Buffer {
  if (encryptionKeyCache) {
    return encryptionKeyCache;
  }

  const secret = process.env.ENCRYPTION_SECRET;
  if (!secret) {
    throw new Error('ENCRYPTION_SECRET environment variable is required');
  }
  if (secret.length < 32) {
    console.warn('WARNING: ENCRYPTION_SECRET should be at least 32 characters');
  }
  encryptionKeyCache = scryptSync(secret, SALT, 32);
  return encryptionKeyCache;
}

// Tag on every stored ciphertext
const CIPHERTEXT_PREFIX = 'enc:v1:';

/**
 * Encrypt a secret for storage: enc:v1:<iv>:<authTag>:<data>, hex encoded
 */
export function encrypt(text: string): string {
  const key = getEncryptionKey();
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv);

  let encrypted = cipher.update(text, 'utf8', 'hex');
  encrypted += cipher.final('hex');

  const authTag = cipher.getAuthTag();

  return `${CIPHERTEXT_PREFIX}${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
}

export function decrypt(encryptedText: string): string {
  if (!isEncrypted(encryptedText)) {
    throw new Error('Invalid encrypted text format');
  }

  const parts = encryptedText.slice(CIPHERTEXT_PREFIX.length).split(':');
  if (parts.length !== 3) {
    throw new Error('Invalid encrypted text format');
  }

  const key = getEncryptionKey();
  const iv = Buffer.from(parts[0], 'hex');
  const authTag = Buffer.from(parts[1], 'hex');
  const encrypted = parts[2];

  if (iv.length !== IV_LENGTH) {
    throw new Error('Invalid IV length');
  }
  if (authTag.length !== AUTH_TAG_LENGTH) {
    throw new Error('Invalid auth tag length');
  }

  const decipher = createDecipheriv(ALGORITHM, key, iv);
  decipher.setAuthTag(authTag);

  let decrypted = decipher.update(encrypted, 'hex', 'utf8');
  decrypted += decipher.final('utf8');

  return decrypted;
}

export function isEncrypted(text: string): boolean {
  return text.startsWith(CIPHERTEXT_PREFIX);
}

/**
 * Encrypt the named string fields of a credential map about to be stored.
 * Input is always plaintext; every non-empty sensitive string is encrypted.
 */
export function encryptSensitiveFields(
  obj: Record<string, unknown>,
  sensitiveFields: readonly string[]
): Record<string, unknown> {
  const result = { ...obj };

  for (const field of sensitiveFields) {
    const value = result[field];
    if (typeof value === 'string' && value.length > 0) {
      result[field] = encrypt(value);
    }
  }

  return result;
}

/**
 * Decrypt the tagged fields of a stored credential map
 * @throws Error if a tagged field fails to decrypt
 */
export function decryptSensitiveFields(
  obj: Record<string, unknown>,
  sensitiveFields: readonly string[]
): Record<string, unknown> {
  const result = { ...obj };

  for (const field of sensitiveFields) {
    const value = result[field];
    if (typeof value === 'string' && isEncrypted(value)) {
      result[field] = decrypt(value);
    }
  }

  return result;
}
