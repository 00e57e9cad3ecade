import { config } from '../../config/index.js';
import {
  createValidationError,
  createInvalidParameterError,
  ErrorCodes,
} from '../../core/errors.js';
import type { PaginationOptions, DateRange } from '../../core/types.js';

export type { PaginationOptions, DateRange } from '../../core/types.js';

/**
 * Get current ISO timestamp (same shape as the SQLite column default)
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Resolve limit/offset, capping the limit at the configured maximum.
 */
export function resolvePagination(options: PaginationOptions = {}): {
  limit: number;
  offset: number;
} {
  const defaultLimit = config.pagination.defaultLimit;
  const maxLimit = config.pagination.maxLimit;

  const limit = Math.min(Math.max(options.limit ?? defaultLimit, 1), maxLimit);
  const offset = Math.max(options.offset ?? 0, 0);
  return { limit, offset };
}

// =============================================================================
// INPUT NORMALISATION
// =============================================================================

/**
 * Trim a required text field; empty after trimming is a validation error.
 */
export function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw createValidationError(field, 'is required');
  }
  return trimmed;
}

/**
 * Trim an optional text field; empty becomes null.
 */
export function optionalText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Check that a value is a real calendar date written as YYYY-MM-DD.
 */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function assertIsoDate(field: string, value: string): string {
  if (!isIsoDate(value)) {
    throw createInvalidParameterError(
      field,
      `expected a calendar date as YYYY-MM-DD, got "${value}"`,
      ErrorCodes.INVALID_DATE
    );
  }
  return value;
}

export function assertDateRange(range: DateRange): DateRange {
  assertIsoDate('from', range.from);
  assertIsoDate('to', range.to);
  if (range.from > range.to) {
    throw createInvalidParameterError('range', `from (${range.from}) is after to (${range.to})`);
  }
  return range;
}
