/**
 * Webhook Signature Verifier
 *
 * Recomputes HMAC-SHA256 over the raw payload with the provider's shared
 * secret and compares it to the signature header in constant time.
 * Anything that cannot be verified is rejected.
 */

import * as crypto from 'crypto';
import { WebhookSecrets, WebhookVerificationResult } from './types';
import { WebhookSignatureError } from './errors';
import { normalizeSignature, signPayload } from './signer';

const HEX_PATTERN = /^[0-9a-f]+$/;

/**
 * Timing-safe string comparison
 */
export function timingSafeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

/**
 * Usage:
 * ```typescript
 * const verifier = new WebhookSignatureVerifier({ stripe: 'whsec-value' });
 * const result = verifier.verify('stripe', rawBody, headers['x-signature']);
 * if (!result.valid) {
 *   throw new Error(result.error);
 * }
 * ```
 */
export class WebhookSignatureVerifier {
  private readonly secrets = new Map<string, string>();

  constructor(secrets: WebhookSecrets = {}) {
    for (const [provider, secret] of Object.entries(secrets)) {
      if (secret) {
        this.secrets.set(provider, secret);
      }
    }
  }

  hasSecret(provider: string): boolean {
    return this.secrets.has(provider);
  }

  verify(
    provider: string,
    rawPayload: string | Buffer,
    signatureHeader: string | undefined
  ): WebhookVerificationResult {
    const secret = this.secrets.get(provider);
    if (!secret) {
      return {
        valid: false,
        provider,
        error: `No webhook secret configured for provider ${provider}`,
        errorCode: 'UNKNOWN_PROVIDER',
      };
    }

    if (!signatureHeader || signatureHeader.trim() === '') {
      return {
        valid: false,
        provider,
        error: 'Missing webhook signature',
        errorCode: 'MISSING_SIGNATURE',
      };
    }

    const actual = normalizeSignature(signatureHeader);
    const expected = signPayload(rawPayload, secret);

    if (!HEX_PATTERN.test(actual) || !timingSafeCompare(expected, actual)) {
      return {
        valid: false,
        provider,
        error: `Invalid webhook signature for provider ${provider}`,
        errorCode: 'INVALID_SIGNATURE',
      };
    }

    return { valid: true, provider };
  }

  /**
   * Same as verify(), throwing WebhookSignatureError on any failure
   */
  assertValid(provider: string, rawPayload: string | Buffer, signatureHeader: string | undefined): void {
    const result = this.verify(provider, rawPayload, signatureHeader);
    if (!result.valid) {
      throw new WebhookSignatureError(
        result.error ?? 'Webhook signature verification failed',
        result.errorCode ?? 'INVALID_SIGNATURE',
        provider
      );
    }
  }
}
