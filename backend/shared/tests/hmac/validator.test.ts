import * as crypto from 'crypto';
import {
  WebhookSignatureError,
  WebhookSignatureVerifier,
  normalizeSignature,
  signPayload,
  timingSafeCompare,
} from '../../src/hmac';

const payload = '{"id":"evt_1","type":"charge.succeeded","amount":2500}';
const expectedDigest = crypto.createHmac('sha256', 'test-secret').update(payload).digest('hex');

describe('Webhook signatures', () => {
  describe('signPayload', () => {
    test('computes the HMAC-SHA256 hex digest of the raw payload', () => {
      expect(signPayload(payload, 'test-secret')).toBe(expectedDigest);
      expect(signPayload(Buffer.from(payload), 'test-secret')).toBe(expectedDigest);
    });
  });

  describe('normalizeSignature', () => {
    test('strips the sha256= prefix and lowercases', () => {
      expect(normalizeSignature(' sha256=ABCDEF ')).toBe('abcdef');
      expect(normalizeSignature('SHA256=abc')).toBe('abc');
      expect(normalizeSignature('abc123')).toBe('abc123');
    });
  });

  describe('timingSafeCompare', () => {
    test('compares equal-length strings', () => {
      expect(timingSafeCompare('abcd', 'abcd')).toBe(true);
      expect(timingSafeCompare('abcd', 'abce')).toBe(false);
    });

    test('rejects different lengths without throwing', () => {
      expect(timingSafeCompare('abc', 'abcd')).toBe(false);
    });
  });

  describe('WebhookSignatureVerifier', () => {
    const verifier = new WebhookSignatureVerifier({
      stripe: 'test-secret',
      xendit: 'other-test-secret',
      razorpay: undefined,
    });

    test('accepts a matching signature', () => {
      expect(verifier.verify('stripe', payload, expectedDigest)).toEqual({ valid: true, provider: 'stripe' });
      expect(verifier.verify('stripe', payload, `sha256=${expectedDigest.toUpperCase()}`).valid).toBe(true);
    });

    test('rejects a signature computed with another provider secret', () => {
      expect(verifier.verify('xendit', payload, expectedDigest)).toEqual({
        valid: false,
        provider: 'xendit',
        error: 'Invalid webhook signature for provider xendit',
        errorCode: 'INVALID_SIGNATURE',
      });
    });

    test('rejects a tampered payload', () => {
      const tampered = payload.replace('2500', '250000');
      expect(verifier.verify('stripe', tampered, expectedDigest).errorCode).toBe('INVALID_SIGNATURE');
    });

    test('fails closed for providers without a secret', () => {
      expect(verifier.hasSecret('razorpay')).toBe(false);
      expect(verifier.verify('razorpay', payload, expectedDigest).errorCode).toBe('UNKNOWN_PROVIDER');
      expect(verifier.verify('airwallex', payload, expectedDigest).errorCode).toBe('UNKNOWN_PROVIDER');
    });

    test('fails closed on missing or malformed signatures', () => {
      expect(verifier.verify('stripe', payload, undefined).errorCode).toBe('MISSING_SIGNATURE');
      expect(verifier.verify('stripe', payload, '   ').errorCode).toBe('MISSING_SIGNATURE');
      expect(verifier.verify('stripe', payload, 'not-hex').errorCode).toBe('INVALID_SIGNATURE');
      expect(verifier.verify('stripe', payload, expectedDigest.slice(0, 10)).errorCode).toBe('INVALID_SIGNATURE');
    });

    test('assertValid throws a WebhookSignatureError', () => {
      expect(() => verifier.assertValid('stripe', payload, expectedDigest)).not.toThrow();

      try {
        verifier.assertValid('stripe', payload, 'deadbeef');
        throw new Error('expected assertValid to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(WebhookSignatureError);
        expect(error).toMatchObject({ code: 'INVALID_SIGNATURE', provider: 'stripe', statusCode: 401 });
      }
    });
  });
});
