/**
 * HMAC Types
 *
 * Type definitions for webhook signature verification.
 */

/**
 * Per-provider shared secrets, keyed by canonical provider name
 */
export type WebhookSecrets = Record<string, string | undefined>;

export type WebhookErrorCode =
  | 'UNKNOWN_PROVIDER'
  | 'MISSING_SIGNATURE'
  | 'INVALID_SIGNATURE';

/**
 * Result of webhook signature verification
 */
export interface WebhookVerificationResult {
  valid: boolean;
  provider: string;
  error?: string;
  errorCode?: WebhookErrorCode;
}

/**
 * Prefix some providers put in front of the hex digest
 */
export const SIGNATURE_PREFIX = 'sha256=';
