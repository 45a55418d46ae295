/**
 * HMAC Signer
 *
 * Computes HMAC-SHA256 signatures over raw webhook payloads.
 */

import * as crypto from 'crypto';
import { SIGNATURE_PREFIX } from './types';

/**
 * Hex-encoded HMAC-SHA256 of the raw payload
 */
export function signPayload(payload: string | Buffer, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

/**
 * Strip an optional "sha256=" prefix and surrounding whitespace, lowercase the digest
 */
export function normalizeSignature(header: string): string {
  const trimmed = header.trim();
  const digest = trimmed.toLowerCase().startsWith(SIGNATURE_PREFIX)
    ? trimmed.slice(SIGNATURE_PREFIX.length)
    : trimmed;
  return digest.toLowerCase();
}
