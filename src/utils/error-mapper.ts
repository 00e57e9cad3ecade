import { FotoReportError, ErrorCodes, sanitizeErrorMessage } from '../core/errors.js';
import { getConstraintViolation, type ConstraintViolation } from '../db/constraint-errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

const VIOLATION_CODES: Record<ConstraintViolation['kind'], string> = {
  unique: ErrorCodes.ALREADY_EXISTS,
  foreign_key: ErrorCodes.REFERENCE_NOT_FOUND,
  check: ErrorCodes.CHECK_VIOLATION,
  not_null: ErrorCodes.MISSING_REQUIRED_FIELD,
};

function violationDetails(violation: ConstraintViolation): Record<string, unknown> {
  return {
    kind: violation.kind,
    ...(violation.table !== undefined && { table: violation.table }),
    ...(violation.columns !== undefined && { columns: violation.columns }),
    ...(violation.constraint !== undefined && { constraint: violation.constraint }),
  };
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Known application errors
  if (error instanceof FotoReportError) {
    return {
      message: error.message,
      code: error.code,
      details: error.context,
    };
  }

  // 2. Engine integrity violations, from either driver
  const violation = getConstraintViolation(error);
  if (violation) {
    return {
      message: sanitizeErrorMessage(violation.cause.message),
      code: VIOLATION_CODES[violation.kind],
      details: violationDetails(violation),
    };
  }

  // 3. Standard errors
  if (error instanceof Error) {
    logger.warn({ error: error.message }, 'Unmapped internal error');
    return {
      message: sanitizeErrorMessage(error.message),
      code: ErrorCodes.INTERNAL_ERROR,
    };
  }

  // 4. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: sanitizeErrorMessage(String(error)),
    code: ErrorCodes.UNKNOWN_ERROR,
  };
}
