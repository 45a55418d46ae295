/**
 * HMAC Errors
 */

import { WebhookErrorCode } from './types';

/**
 * Error thrown when a webhook signature cannot be verified
 */
export class WebhookSignatureError extends Error {
  constructor(
    message: string,
    public readonly code: WebhookErrorCode,
    public readonly provider: string,
    public readonly statusCode: number = 401
  ) {
    super(message);
    this.name = 'WebhookSignatureError';
    Object.setPrototypeOf(this, WebhookSignatureError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      provider: this.provider,
      statusCode: this.statusCode,
    };
  }
}
