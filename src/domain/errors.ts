/**
 * Application error taxonomy
 * Each error type maps to one outcome category and one HTTP status code
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Underlying storage unavailable or query failure (500 Internal Server Error)
 */
export class StorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', 500, details);
  }
}

/**
 * Required field empty or malformed (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * No entity matches the lookup key (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, key: Record<string, string | number>) {
    const lookup = Object.entries(key)
      .map(([field, value]) => `${field}=${value}`)
      .join(', ');
    super(`${resource} not found (${lookup})`, 'NOT_FOUND', 404, { resource, ...key });
  }
}

/**
 * Unique key already taken (409 Conflict)
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
  }
}

/**
 * Route points at a missing or disabled backend (400 Bad Request)
 */
export class InvalidReferenceError extends AppError {
  constructor(backendName: string) {
    super(`Backend ${backendName} not found or disabled`, 'INVALID_REFERENCE', 400, {
      backendName,
    });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
