import crypto from 'crypto';
import type { WebhookEnvelope, WebhookEvent } from './types';

export const SIGNATURE_HEADER = 'X-Signature';
const SIGNATURE_PREFIX = 'sha256=';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function canonicalValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalValue);
  if (value instanceof Date) return value.toISOString();
  if (isPlainObject(value)) return canonicalObject(value);
  return value;
}

/**
 * Copy of `obj` with keys sorted at every depth
 */
export function canonicalObject(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const key of Object.keys(obj).sort()) {
    out[key] = canonicalValue(obj[key]);
  }
  return out;
}

/**
 * Serialize the webhook body. Field order is fixed:
 * event, timestamp, data.entityId, then the remaining data keys sorted.
 */
export function serializeEnvelope(
  event: WebhookEvent,
  entityId: string,
  data: Record<string, unknown>,
  timestamp: Date
): string {
  const { entityId: _ignored, ...rest } = data;
  const envelope: WebhookEnvelope = {
    event,
    timestamp: timestamp.toISOString(),
    data: { entityId, ...canonicalObject(rest) },
  };
  return JSON.stringify(envelope);
}

/**
 * HMAC-SHA256 over the exact body bytes, hex encoded
 */
export function computeSignature(secret: string, body: Buffer | string): string {
  return crypto.createHmac('sha256', secret).update(body).digest('hex');
}

export function signatureHeaderValue(secret: string, body: Buffer | string): string {
  return `${SIGNATURE_PREFIX}${computeSignature(secret, body)}`;
}

/**
 * Receiver-side check of an `X-Signature` header value against the raw body
 */
export function verifySignature(header: string | undefined, secret: string, body: Buffer | string): boolean {
  if (!header || !header.startsWith(SIGNATURE_PREFIX)) return false;

  const provided = Buffer.from(header.slice(SIGNATURE_PREFIX.length), 'hex');
  const expected = Buffer.from(computeSignature(secret, body), 'hex');
  if (provided.length !== expected.length) return false;

  return crypto.timingSafeEqual(provided, expected);
}
