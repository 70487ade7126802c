import { createHmac, timingSafeEqual } from 'crypto';

/**
 * Hex HMAC-SHA256 of the raw webhook body under the shared webhook secret.
 */
export function signPayload(rawBody: Buffer | string, secret: string): string {
  return createHmac('sha256', secret).update(rawBody).digest('hex');
}

export function verifySignature(rawBody: Buffer | string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;

  const expected = Buffer.from(signPayload(rawBody, secret), 'utf8');
  const received = Buffer.from(signature.trim().toLowerCase(), 'utf8');
  return expected.length === received.length && timingSafeEqual(expected, received);
}

/**
 * Signature headers sent with a Chapa webhook. `x-chapa-signature` signs the
 * body; `chapa-signature` signs the secret itself.
 */
export interface WebhookSignatures {
  body?: string;
  secret?: string;
}

export function verifyWebhookSignatures(rawBody: Buffer | string, signatures: WebhookSignatures, secret: string): boolean {
  if (signatures.body !== undefined) {
    return verifySignature(rawBody, signatures.body, secret);
  }
  return verifySignature(secret, signatures.secret, secret);
}
