/**
 * Custom Error Classes
 * 
 * Standardized error types for better error handling and debugging.
 * Only ValidationError is meant to end a run; the others are caught,
 * logged and counted by the ingestion loop.
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
 * Error for validation failures (bad season label, bad model parameters, bad configuration)
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
    cause?: Error
  ) {
    super(message, 'API_ERROR', statusCode, cause);
  }
}

/**
 * Error raised when the upstream source signals throttling
 */
export class RateLimitError extends ApiError {
  constructor(url: string, statusCode: number = 429) {
    super(`Rate limited by upstream source: ${url}`, url, statusCode);
    this.code = 'RATE_LIMITED';
  }
}

/**
 * Error for pages whose structure does not match what the parser expects
 */
export class ParseError extends AppError {
  constructor(message: string, public url: string) {
    super(message, 'PARSE_ERROR', 422);
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
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
