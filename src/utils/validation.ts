import { ErrorCode, ValidationError } from '../types';

/**
 * Request-body field readers for the HTTP layer
 *
 * Each returns the typed value or throws a ValidationError naming the field.
 */

export function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`Missing required field: ${field}`, ErrorCode.VALIDATION_ERROR, { field });
  }
  return value;
}

export function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  return requireString(value, field);
}

const PLAIN_DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Accepts numbers and plain decimal strings (form posts send strings);
 * hex, exponent and other Number() spellings are refused
 */
export function requireNumber(value: unknown, field: string): number {
  const parsed = typeof value === 'string' && PLAIN_DECIMAL.test(value.trim()) ? Number(value) : value;

  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new ValidationError(`Field ${field} must be a number`, ErrorCode.VALIDATION_ERROR, { field });
  }
  return parsed;
}

export function requireStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== 'string')) {
    throw new ValidationError(`Field ${field} must be a list of ids`, ErrorCode.VALIDATION_ERROR, { field });
  }
  return value;
}

/**
 * Absolute instant from an ISO string or epoch milliseconds
 */
export function requireDate(value: unknown, field: string): Date {
  const date = typeof value === 'string' || typeof value === 'number' ? new Date(value) : null;

  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(`Field ${field} must be a valid date`, ErrorCode.INVALID_DEADLINE, { field });
  }
  return date;
}
