// AES-GCM encryption helpers for sensitive fields stored at rest (email)
import crypto from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export type CipherErrorCode = 'InvalidKey' | 'MalformedCiphertext' | 'DecryptionFailed';

export class CipherError extends Error {
  constructor(
    readonly code: CipherErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'CipherError';
  }
}

function toKey(key: string) {
  const k = Buffer.from(key, 'utf8');
  if (k.length !== KEY_BYTES) {
    throw new CipherError('InvalidKey', `encryption key must be ${KEY_BYTES} bytes`);
  }
  return k;
}

/**
 * Encrypts `plain` under a 32-byte key. The token is
 * base64(iv | tag | ciphertext) with a fresh IV per call, so the same input
 * never produces the same token twice.
 */
export function encryptField(plain: string, key: string) {
  const k = toKey(key);
  const iv = crypto.randomBytes(IV_BYTES);
  const cipher = crypto.createCipheriv(ALGORITHM, k, iv);
  const ct = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return Buffer.concat([iv, tag, ct]).toString('base64');
}

export function decryptField(token: string, key: string) {
  const k = toKey(key);
  if (!BASE64_RE.test(token)) {
    throw new CipherError('MalformedCiphertext', 'ciphertext is not valid base64');
  }
  const raw = Buffer.from(token, 'base64');
  if (raw.length < IV_BYTES + TAG_BYTES) {
    throw new CipherError('MalformedCiphertext', 'ciphertext too short');
  }
  const iv = raw.subarray(0, IV_BYTES);
  const tag = raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
  const ct = raw.subarray(IV_BYTES + TAG_BYTES);
  const decipher = crypto.createDecipheriv(ALGORITHM, k, iv);
  decipher.setAuthTag(tag);
  try {
    return Buffer.concat([decipher.update(ct), decipher.final()]).toString('utf8');
  } catch (err) {
    throw new CipherError('DecryptionFailed', `ciphertext failed authentication: ${String(err)}`);
  }
}

export function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

// lookup key: sha256 of the normalized address, so records can be found without a plaintext index
export function deriveEmailLookup(email: string) {
  return crypto.createHash('sha256').update(normalizeEmail(email), 'utf8').digest('base64');
}
