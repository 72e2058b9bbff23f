/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 * Every one of them ends the current invocation; none is retried.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public exitCode: number = 1,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for malformed or out-of-range input
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

/**
 * Error for a checkpoint, row or file that does not exist
 */
export class NotFoundError extends AppError {
  constructor(message: string, public entity: string) {
    super(message, 'NOT_FOUND');
  }
}

/**
 * Error for data that contradicts itself: checkpoints on different maps,
 * an impossible adjusted time, or a stored value that does not match what was written
 */
export class ConsistencyError extends AppError {
  constructor(message: string) {
    super(message, 'CONSISTENCY_ERROR');
  }
}

/**
 * Error for an unreachable store or tunnel, or missing privileges on it
 */
export class ConnectivityError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTIVITY_ERROR', 1, cause);
  }
}

/**
 * Error for database operations
 */
export class DatabaseError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', 1, cause);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
