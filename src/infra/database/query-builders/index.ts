/**
 * Query Builders
 *
 * Safe SQL construction utilities that encapsulate sql.raw() usage.
 * Repositories should import from this module instead of using sql.raw() directly.
 *
 * @example
 * ```typescript
 * import {
 *   withReadOnlySnapshot,
 *   yearOf,
 * } from '../../../../infra/database/query-builders/index.js';
 *
 * const rows = await withReadOnlySnapshot(db, 30_000, (trx) =>
 *   trx
 *     .selectFrom('sales.salesorderheader as soh')
 *     .select(yearOf('soh.orderdate').as('year'))
 *     .execute()
 * );
 * ```
 */

// ============================================================================
// Snapshot
// ============================================================================

export {
  withReadOnlySnapshot,
  DEFAULT_QUERY_TIMEOUT_MS,
  MAX_QUERY_TIMEOUT_MS,
  MIN_QUERY_TIMEOUT_MS,
} from './snapshot.js';

// ============================================================================
// Expressions
// ============================================================================

export {
  yearOf,
  monthOf,
  onOrAfterDate,
  beforeDate,
  latestDateOf,
  roundedAverageOf,
} from './expressions.js';
