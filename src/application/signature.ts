import { createHmac, timingSafeEqual } from 'node:crypto';

/** Lowercase hex HMAC-SHA256 of the exact request bytes. */
export function computeSignature(secret: string, rawBody: Buffer | string): string {
  return createHmac('sha256', secret).update(rawBody).digest('hex');
}

/**
 * Constant-time check of a webhook signature header.
 * A missing header or a length mismatch is a failed verification.
 */
export function verifySignature(
  secret: string,
  rawBody: Buffer | string,
  signature: string | undefined,
): boolean {
  if (!signature) return false;

  const expected = Buffer.from(computeSignature(secret, rawBody), 'utf-8');
  const provided = Buffer.from(signature, 'utf-8');
  if (provided.length !== expected.length) return false;

  return timingSafeEqual(provided, expected);
}
