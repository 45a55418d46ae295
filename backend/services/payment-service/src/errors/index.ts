/**
 * RFC 7807 Error Classes for Payment Service
 *
 * Problem Details format:
 * {
 *   type: string (URI reference)
 *   title: string
 *   status: number
 *   detail: string
 *   instance: string (request ID)
 *   ...extensions
 * }
 */

export type ProblemDetails = Record<string, unknown>;

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export abstract class BaseError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly type: string;
  public readonly title: string;
  public readonly detail: string;
  public readonly timestamp: string;
  public readonly requestId?: string;
  public readonly errorCause?: unknown;

  constructor(params: {
    code: string;
    statusCode: number;
    message: string;
    type?: string;
    title?: string;
    detail?: string;
    isOperational?: boolean;
    requestId?: string;
    cause?: unknown;
  }) {
    super(params.message);

    this.name = new.target.name;
    this.code = params.code;
    this.statusCode = params.statusCode;
    this.type = params.type || `urn:error:payment-service:${params.code.toLowerCase()}`;
    this.title = params.title || params.message;
    this.detail = params.detail || params.message;
    this.isOperational = params.isOperational ?? true;
    this.timestamp = new Date().toISOString();
    this.requestId = params.requestId;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);

    if (params.cause !== undefined) {
      this.errorCause = params.cause;
    }
  }

  /**
   * Convert to RFC 7807 Problem Details format
   */
  toRFC7807(instance?: string): ProblemDetails {
    return {
      type: this.type,
      title: this.title,
      status: this.statusCode,
      detail: this.detail,
      instance: instance || this.requestId,
      code: this.code,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// VALIDATION ERRORS
// =============================================================================

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends BaseError {
  public readonly validationErrors: FieldError[];

  constructor(message: string, validationErrors: FieldError[] = []) {
    super({
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      message,
      title: 'Validation Error',
    });
    this.validationErrors = validationErrors;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      validationErrors: this.validationErrors,
    };
  }
}

// =============================================================================
// NOT FOUND / CONFLICT
// =============================================================================

export class NotFoundError extends BaseError {
  public readonly resource: string;
  public readonly resourceId?: string;

  constructor(resource: string, resourceId?: string) {
    super({
      code: 'NOT_FOUND',
      statusCode: 404,
      message: resourceId
        ? `${resource} with ID ${resourceId} not found`
        : `${resource} not found`,
      title: 'Resource Not Found',
    });
    this.resource = resource;
    this.resourceId = resourceId;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      resource: this.resource,
      resourceId: this.resourceId,
    };
  }
}

export class ConflictError extends BaseError {
  constructor(message: string, cause?: unknown) {
    super({
      code: 'CONFLICT',
      statusCode: 409,
      message,
      title: 'Resource Conflict',
      cause,
    });
  }
}

// =============================================================================
// PROVIDER ERRORS
// =============================================================================

/**
 * The selected provider does not implement an optional capability.
 * An expected branch, not a fault.
 */
export class NotSupportedError extends BaseError {
  public readonly provider: string;
  public readonly capability: string;

  constructor(provider: string, capability: string) {
    super({
      code: 'NOT_SUPPORTED',
      statusCode: 501,
      message: `feature not supported by provider: ${provider} does not support ${capability}`,
      title: 'Feature Not Supported',
    });
    this.provider = provider;
    this.capability = capability;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      provider: this.provider,
      capability: this.capability,
    };
  }
}

export class NoAvailableProviderError extends BaseError {
  public readonly currency?: string;

  constructor(currency?: string) {
    super({
      code: 'NO_AVAILABLE_PROVIDER',
      statusCode: 503,
      message: currency
        ? `no available payment provider for currency: ${currency}`
        : 'no available payment provider',
      title: 'No Available Provider',
    });
    this.currency = currency;
  }
}

/**
 * A stored mapping names a provider that is not part of the configured set
 */
export class ProviderUnavailableError extends BaseError {
  public readonly provider: string;

  constructor(provider: string) {
    super({
      code: 'PROVIDER_UNAVAILABLE',
      statusCode: 503,
      message: `provider ${provider} not available`,
      title: 'Provider Not Available',
    });
    this.provider = provider;
  }
}

export class ProviderError extends BaseError {
  public readonly provider: string;
  public readonly operation: string;
  public readonly retryable: boolean;

  constructor(params: {
    provider: string;
    operation: string;
    cause: unknown;
    retryable?: boolean;
  }) {
    super({
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      message: `failed to ${params.operation} with provider ${params.provider}: ${describeCause(params.cause)}`,
      title: 'Payment Provider Error',
      cause: params.cause,
    });
    this.provider = params.provider;
    this.operation = params.operation;
    this.retryable = params.retryable ?? false;
  }

  toRFC7807(instance?: string): ProblemDetails {
    return {
      ...super.toRFC7807(instance),
      provider: this.provider,
      operation: this.operation,
      retryable: this.retryable,
    };
  }
}

// =============================================================================
// INTERNAL ERRORS
// =============================================================================

export class PersistenceError extends BaseError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super({
      code: 'PERSISTENCE_ERROR',
      statusCode: 500,
      message: `failed to ${operation}: ${describeCause(cause)}`,
      title: 'Persistence Error',
      cause,
    });
    this.operation = operation;
  }
}

export class ConfigurationError extends BaseError {
  constructor(message: string, public readonly issues: FieldError[] = []) {
    super({
      code: 'CONFIGURATION_ERROR',
      statusCode: 500,
      message,
      title: 'Configuration Error',
      isOperational: false,
    });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * Normalise anything caught into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function isOperationalError(error: unknown): boolean {
  return error instanceof BaseError && error.isOperational;
}
