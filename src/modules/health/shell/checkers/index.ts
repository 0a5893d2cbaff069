/**
 * Health checker factories
 *
 * Creates health checkers for the configured sales data source.
 */

export {
  makeSalesDbHealthChecker,
  type SalesDbHealthCheckerOptions,
} from './sales-db-checker.js';
export {
  makeSnapshotHealthChecker,
  type SnapshotHealthCheckerOptions,
} from './snapshot-checker.js';
