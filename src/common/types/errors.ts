/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (database, seed files)
 */
export interface InfraError extends AppError {
  readonly type: 'DatabaseError' | 'TimeoutError';
  readonly retryable: boolean;
}

/**
 * Validation errors (input validation failures)
 */
export interface ValidationError extends AppError {
  readonly type: 'ValidationError';
  readonly field?: string | undefined;
  readonly value?: unknown;
}

/**
 * Not found errors
 */
export interface NotFoundError extends AppError {
  readonly type: 'NotFoundError';
  readonly resource: string;
  readonly id: string;
}

export const createNotFoundError = (resource: string, id: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `${resource} with id '${id}' not found`,
  resource,
  id,
});

export const createValidationError = (
  message: string,
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  ...(field !== undefined && { field }),
  ...(value !== undefined && { value }),
});

export const createDatabaseError = (message: string, cause?: unknown): InfraError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createTimeoutError = (message: string, cause?: unknown): InfraError => ({
  type: 'TimeoutError',
  message,
  retryable: true,
  cause,
});
