import crypto from 'crypto';
import config from '../config';

/**
 * Generate random ID, optionally prefixed (`dlv_<32 hex>`)
 */
export function generateId(prefix: string = ''): string {
  const random = crypto.randomBytes(16).toString('hex');
  return prefix ? `${prefix}_${random}` : random;
}

/**
 * Generate a webhook signing secret
 */
export function generateSecret(): string {
  return `whsec_${crypto.randomBytes(24).toString('base64url')}`;
}

export function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

/**
 * Verify the plain admin key from the X-Admin-Key header:
 * SHA-256 of the provided key must equal ADMIN_KEY (constant-time compare)
 */
export function verifyAdminKey(providedPlainKey: string | undefined): boolean {
  if (typeof providedPlainKey !== 'string' || providedPlainKey.length === 0) {
    return false;
  }

  const providedHash = Buffer.from(sha256Hex(providedPlainKey), 'hex');
  const expectedHash = Buffer.from(config.security.adminKey, 'hex');
  if (providedHash.length !== expectedHash.length) {
    return false;
  }

  return crypto.timingSafeEqual(providedHash, expectedHash);
}
