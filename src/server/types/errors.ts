/**
 * Error hierarchy for the context pipeline
 *
 * Operational errors (bad input, unknown keys, lost version races, slow or
 * misconfigured providers) carry a stable code and HTTP status. Anything that
 * is not an AppError is treated as a programming error.
 */

export enum ErrorCode {
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  STORE_CONFLICT = 'STORE_CONFLICT',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  SERVICE_NOT_CONFIGURED = 'SERVICE_NOT_CONFIGURED',
  DATABASE_ERROR = 'DATABASE_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  TIMEOUT = 'TIMEOUT',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;

    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, code: ErrorCode = ErrorCode.CONFLICT) {
    super(message, code, 409, true, context);
  }
}

/**
 * Raised when a supersede-and-insert write for a logical key cannot be
 * applied atomically (lost race, duplicate latest row, aborted transaction).
 * Never swallowed: a partial flip would break the single-latest invariant.
 */
export class StoreConflictError extends ConflictError {
  constructor(message: string = 'Version flip could not be applied', context?: Record<string, unknown>) {
    super(message, context, ErrorCode.STORE_CONFLICT);
  }
}

/**
 * A provider or strategy was selected but its settings are missing
 */
export class ServiceConfigurationError extends AppError {
  constructor(
    public readonly serviceName: string,
    public readonly missingConfig: string[]
  ) {
    super(
      `${serviceName} not configured. Missing: ${missingConfig.join(', ')}`,
      ErrorCode.SERVICE_NOT_CONFIGURED,
      503,
      true,
      { service: serviceName, missing: missingConfig }
    );
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.DATABASE_ERROR, 500, false, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

export class OperationTimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, 504, true, { operation, timeoutMs });
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

// express.json() rejects unparsable bodies with a SyntaxError carrying the raw body
function isBodyParseError(error: unknown): error is SyntaxError & { body: unknown } {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Convert any thrown value to an AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (isBodyParseError(error)) {
    return new BadRequestError('Request body is not valid JSON');
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
