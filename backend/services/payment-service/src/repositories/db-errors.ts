import { ConflictError } from '../errors';

const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === PG_UNIQUE_VIOLATION;
}

/**
 * Map a unique violation to ConflictError; anything else is rethrown as-is
 */
export function rethrowAsConflict(error: unknown, message: string): never {
  if (isUniqueViolation(error)) {
    throw new ConflictError(message, error);
  }
  throw error;
}
