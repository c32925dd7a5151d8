import { createHmac, timingSafeEqual } from 'node:crypto';

/**
 * Webhook Signature Validation Error
 */
export class WebhookValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WebhookValidationError';
  }
}

/**
 * Compute the signature LINE sends in x-line-signature
 *
 * Base64 HMAC-SHA256 of the raw request body, keyed with the channel secret.
 */
export function computeLineSignature(payload: string | Buffer, channelSecret: string): string {
  return createHmac('sha256', channelSecret).update(payload).digest('base64');
}

/**
 * Validate a LINE webhook signature
 *
 * @param payload - Raw request body, exactly as received
 * @param signature - Value of the x-line-signature header
 * @param channelSecret - Channel secret from the LINE Developers console
 *
 * @throws WebhookValidationError if validation fails
 */
export function validateWebhookSignature(
  payload: string | Buffer,
  signature: string | undefined,
  channelSecret: string
): void {
  if (!signature) {
    throw new WebhookValidationError('Missing x-line-signature header');
  }

  const expected = Buffer.from(computeLineSignature(payload, channelSecret));
  const received = Buffer.from(signature);

  // timingSafeEqual throws on length mismatch
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new WebhookValidationError('Invalid webhook signature');
  }
}

/**
 * Read the signature header from a request's headers
 */
export function extractSignatureHeader(
  headers: Record<string, string | string[] | undefined>
): string | undefined {
  const value = headers['x-line-signature'];
  return Array.isArray(value) ? value[0] : value;
}
