import { createHmac } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import {
  WebhookValidationError,
  computeLineSignature,
  extractSignatureHeader,
  validateWebhookSignature,
} from './webhook-validator.js';

const SECRET = 'test-secret';
const BODY = '{"destination":"U0","events":[]}';

describe('validateWebhookSignature', () => {
  it('accepts the base64 HMAC-SHA256 of the raw body', () => {
    const signature = createHmac('sha256', SECRET).update(BODY).digest('base64');

    expect(computeLineSignature(BODY, SECRET)).toBe(signature);
    expect(() => validateWebhookSignature(BODY, signature, SECRET)).not.toThrow();
    expect(() => validateWebhookSignature(Buffer.from(BODY), signature, SECRET)).not.toThrow();
  });

  it('rejects a missing signature', () => {
    expect(() => validateWebhookSignature(BODY, undefined, SECRET)).toThrow(
      new WebhookValidationError('Missing x-line-signature header')
    );
  });

  it('rejects a signature made with another secret', () => {
    const signature = computeLineSignature(BODY, 'other-secret');
    expect(() => validateWebhookSignature(BODY, signature, SECRET)).toThrow('Invalid webhook signature');
  });

  it('rejects a signature over a modified body', () => {
    const signature = computeLineSignature(BODY, SECRET);
    expect(() => validateWebhookSignature(`${BODY} `, signature, SECRET)).toThrow(WebhookValidationError);
  });

  it('rejects a signature of the wrong length', () => {
    expect(() => validateWebhookSignature(BODY, 'abc', SECRET)).toThrow('Invalid webhook signature');
  });
});

describe('extractSignatureHeader', () => {
  it('reads a single or repeated header', () => {
    expect(extractSignatureHeader({ 'x-line-signature': 'sig' })).toBe('sig');
    expect(extractSignatureHeader({ 'x-line-signature': ['first', 'second'] })).toBe('first');
    expect(extractSignatureHeader({})).toBeUndefined();
  });
});
