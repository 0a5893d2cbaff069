/**
 * Domain error types for Sales Reports module.
 *
 * Following the core/shell pattern:
 * - Core returns Result<T, SalesReportError>
 * - Shell (GraphQL/REST) converts errors to appropriate responses
 */

import type { InfraError, NotFoundError, ValidationError } from '../../../common/types/errors.js';

/**
 * Error type for data source failures (database or seed snapshot).
 */
export type SalesReportRepoError = InfraError;

/**
 * Error type for sales report operations.
 */
export type SalesReportError = InfraError | ValidationError | NotFoundError;

export {
  createDatabaseError,
  createTimeoutError,
  createValidationError,
  createNotFoundError,
} from '../../../common/types/errors.js';

/**
 * Maps a sales report error to an HTTP status code.
 */
export const getHttpStatusForError = (error: SalesReportError): 400 | 404 | 500 | 504 => {
  switch (error.type) {
    case 'ValidationError':
      return 400;
    case 'NotFoundError':
      return 404;
    case 'TimeoutError':
      return 504;
    case 'DatabaseError':
      return 500;
  }
};
