/**
 * Read-only snapshot helper
 *
 * A report (or a defaulted parameter and the report that uses it) runs inside
 * one REPEATABLE READ, READ ONLY transaction so all of its statements observe
 * the same snapshot. No cross-report consistency is implied.
 */

import { sql, type Kysely, type Transaction } from 'kysely';

/** Statement timeout of a report snapshot when none is configured */
export const DEFAULT_QUERY_TIMEOUT_MS = 30_000;

/** Bounds of QUERY_TIMEOUT_MS */
export const MIN_QUERY_TIMEOUT_MS = 1_000;
export const MAX_QUERY_TIMEOUT_MS = 300_000;

/**
 * Throws unless `timeoutMs` is a whole number of milliseconds within bounds.
 * The value is spliced into `SET LOCAL`, which takes no bind parameters.
 */
function assertStatementTimeout(timeoutMs: number): void {
  if (
    !Number.isInteger(timeoutMs) ||
    timeoutMs < MIN_QUERY_TIMEOUT_MS ||
    timeoutMs > MAX_QUERY_TIMEOUT_MS
  ) {
    throw new Error(
      `Report statement timeout must be an integer between ${String(MIN_QUERY_TIMEOUT_MS)} and ${String(MAX_QUERY_TIMEOUT_MS)}ms, got: ${String(timeoutMs)}`
    );
  }
}

/**
 * Runs `fn` inside a read-only repeatable-read transaction with a statement timeout.
 *
 * The timeout is checked before the transaction opens. SET TRANSACTION must
 * precede the first query of the transaction, so it is issued before the
 * timeout and before `fn` runs.
 *
 * @example
 * ```typescript
 * const rows = await withReadOnlySnapshot(db, 30_000, (trx) =>
 *   trx.selectFrom('sales.salesorderheader').select('totaldue').execute()
 * );
 * ```
 */
export async function withReadOnlySnapshot<DB, T>(
  db: Kysely<DB>,
  timeoutMs: number,
  fn: (trx: Transaction<DB>) => Promise<T>
): Promise<T> {
  assertStatementTimeout(timeoutMs);

  return db
    .transaction()
    .setIsolationLevel('repeatable read')
    .execute(async (trx) => {
      await sql`SET TRANSACTION READ ONLY`.execute(trx);
      // SECURITY: validated above; SET LOCAL doesn't support parameterized values
      await sql.raw(`SET LOCAL statement_timeout = ${String(timeoutMs)}`).execute(trx);
      return fn(trx);
    });
}
