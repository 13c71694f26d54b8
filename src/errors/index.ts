/**
 * Custom Error Classes
 *
 * Standardized error types for the ingestion pipeline. Client-level errors
 * (NetworkError, TimeoutError, InvalidResponseError) fail a whole run;
 * MalformedPayloadError and StorageConstraintError are per-record.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for external API failures
 */
export class ApiError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error,
    code: string = 'API_ERROR'
  ) {
    super(message, code, statusCode, cause);
  }
}

/**
 * The remote API could not be reached (DNS, refused connection, reset socket)
 */
export class NetworkError extends ApiError {
  constructor(message: string, url: string, cause?: Error) {
    super(message, url, 0, cause, 'NETWORK_ERROR');
  }
}

/**
 * The remote API did not answer within the request timeout
 */
export class TimeoutError extends ApiError {
  constructor(url: string, public timeoutMs: number, cause?: Error) {
    super(`Request timed out after ${timeoutMs}ms`, url, 0, cause, 'TIMEOUT_ERROR');
  }
}

/**
 * The remote API answered with a non-2xx status or a body that is not a JSON object
 */
export class InvalidResponseError extends ApiError {
  constructor(message: string, url: string, statusCode: number) {
    super(message, url, statusCode, undefined, 'INVALID_RESPONSE');
  }
}

/**
 * A payload field is missing or has the wrong shape
 *
 * `path` points at the offending field, e.g. `games[2].homeTeam.id`.
 */
export class MalformedPayloadError extends AppError {
  constructor(message: string, public path: string) {
    super(`${path}: ${message}`, 'MALFORMED_PAYLOAD', 422);
  }
}

/**
 * Error for database operations
 */
export class DatabaseError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', 500, cause);
  }
}

/**
 * A write was rejected by a storage constraint (unique or foreign key)
 */
export class StorageConstraintError extends DatabaseError {
  constructor(
    message: string,
    operation: string,
    public constraint: 'unique' | 'foreign_key',
    cause?: Error
  ) {
    super(message, operation, cause);
    this.code = 'STORAGE_CONSTRAINT';
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
