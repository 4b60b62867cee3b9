/**
 * Base error class for all store errors
 */
export class ServiceError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode: number = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a referenced parent record does not exist
 */
export class NotFoundError extends ServiceError {
  constructor(resource: string, id?: string, details?: Record<string, unknown>) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when a write collides with a unique key outside the upsert path
 */
export class ConstraintViolationError extends ServiceError {
  constructor(resource: string, message: string, details?: Record<string, unknown>) {
    super(`Constraint violation on ${resource}: ${message}`, 'CONSTRAINT_VIOLATION', 409, details);
    this.name = 'ConstraintViolationError';
  }
}

/**
 * Error thrown when the underlying database cannot be opened or used.
 * Not recoverable at the store layer; callers decide whether to retry.
 */
export class StorageUnavailableError extends ServiceError {
  public readonly operation: string;

  constructor(operation: string, message: string, details?: Record<string, unknown>) {
    super(`Storage unavailable during ${operation}: ${message}`, 'STORAGE_UNAVAILABLE', 503, details);
    this.name = 'StorageUnavailableError';
    this.operation = operation;
  }
}

/**
 * Error thrown when an argument cannot be used as given
 */
export class MalformedInputError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MALFORMED_INPUT', 400, details);
    this.name = 'MalformedInputError';
  }
}
