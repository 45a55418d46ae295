/**
 * HMAC Module
 *
 * HMAC-SHA256 signing and constant-time verification of provider webhooks.
 *
 * Usage:
 * ```typescript
 * import { WebhookSignatureVerifier } from '@paymesh/shared';
 *
 * const verifier = new WebhookSignatureVerifier({ stripe: process.env.STRIPE_WEBHOOK_SECRET });
 * verifier.assertValid('stripe', rawBody, signatureHeader);
 * ```
 */

// Types
export type { WebhookSecrets, WebhookErrorCode, WebhookVerificationResult } from './types';
export { SIGNATURE_PREFIX } from './types';

// Errors
export { WebhookSignatureError } from './errors';

// Signer
export { signPayload, normalizeSignature } from './signer';

// Validator
export { WebhookSignatureVerifier, timingSafeCompare } from './validator';
