/**
 * Core error definitions - transport-agnostic
 *
 * Error classes, codes and factory functions shared by the db, config and
 * CLI layers. Engine integrity violations (unique, foreign key, check) are
 * NOT wrapped here; they reach callers as the driver raised them and are
 * recognised with the helpers in db/constraint-errors.ts.
 */

/**
 * Sanitize error messages to remove sensitive information in production.
 */
export function sanitizeErrorMessage(message: string): string {
  // Check production mode dynamically for testability
  if (process.env.NODE_ENV !== 'production') {
    return message;
  }

  return (
    message
      // Unix paths
      .replace(
        /\/(?:Users|home|var|tmp|etc|opt|usr|private|root|srv|mnt|data)\/[^\s:,)'"]+/gi,
        '[REDACTED_PATH]'
      )
      // Windows paths
      .replace(/[A-Z]:\\[^\s:,)'"]+/gi, '[REDACTED_PATH]')
      // Connection strings with credentials
      .replace(/(?:postgres|postgresql):\/\/[^:]+:[^@]+@[^\s]+/gi, '[REDACTED_CONNECTION_STRING]')
      // Stack trace lines
      .replace(/at\s+[\w.<>]+\s+\([^)]+\)/g, '[REDACTED_STACK]')
      .replace(/at\s+[^\s]+:[0-9]+:[0-9]+/g, '[REDACTED_STACK]')
  );
}

export class FotoReportError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FotoReportError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  MISSING_REQUIRED_FIELD: 'E1000',
  INVALID_PARAMETER: 'E1001',
  INVALID_DATE: 'E1002',
  INVALID_MIME_TYPE: 'E1003',

  // Resource errors (2000-2999)
  NOT_FOUND: 'E2000',
  ALREADY_EXISTS: 'E2001',
  REFERENCE_NOT_FOUND: 'E2002',
  CHECK_VIOLATION: 'E2003',

  // Database errors (4000-4999)
  DATABASE_ERROR: 'E4000',
  MIGRATION_ERROR: 'E4001',
  CONNECTION_ERROR: 'E4002',
  TRANSACTION_ERROR: 'E4004',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
  SERVICE_UNAVAILABLE: 'E5002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Database-specific errors
 */
export class DatabaseError extends FotoReportError {
  constructor(
    message: string,
    code: string = ErrorCodes.DATABASE_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'DatabaseError';
  }
}

/**
 * Connection-related errors
 */
export class ConnectionError extends DatabaseError {
  constructor(
    message: string,
    public readonly isRetryable: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.CONNECTION_ERROR, { ...context, isRetryable });
    this.name = 'ConnectionError';
  }
}

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): FotoReportError {
  return new FotoReportError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.MISSING_REQUIRED_FIELD,
    { field, suggestion }
  );
}

/**
 * Create an invalid parameter error (value present but malformed)
 */
export function createInvalidParameterError(
  field: string,
  message: string,
  code: ErrorCode = ErrorCodes.INVALID_PARAMETER
): FotoReportError {
  return new FotoReportError(`Invalid ${field}: ${message}`, code, { field });
}

/**
 * Create a not found error with resource details
 */
export function createNotFoundError(resource: string, identifier?: string | number): FotoReportError {
  const message =
    identifier !== undefined ? `${resource} not found: ${identifier}` : `${resource} not found`;

  return new FotoReportError(message, ErrorCodes.NOT_FOUND, {
    resource,
    identifier,
    suggestion: `Check that the ${resource} exists and you have the correct ID`,
  });
}

/**
 * Create a service unavailable error
 */
export function createServiceUnavailableError(service: string, reason?: string): FotoReportError {
  const message = reason ? `${service} is unavailable: ${reason}` : `${service} is unavailable`;
  return new FotoReportError(message, ErrorCodes.SERVICE_UNAVAILABLE, {
    service,
    suggestion: `Check ${service} configuration and dependencies`,
  });
}

/**
 * Create a migration error
 */
export function createMigrationError(migration: string, reason: string): DatabaseError {
  return new DatabaseError(`Migration ${migration} failed: ${reason}`, ErrorCodes.MIGRATION_ERROR, {
    migration,
  });
}
