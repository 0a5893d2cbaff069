/**
 * Sales database health checker
 *
 * Reads the latest order date from `sales.salesorderheader`, which proves the
 * pool can connect and that the sales schema is visible to the service role.
 * A reachable database with no orders is still healthy: every report is
 * simply empty.
 */

import { latestDateOf } from '../../../../infra/database/query-builders/index.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { SalesDbClient } from '../../../../infra/database/client.js';

/** Default timeout for the sales database check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface SalesDbHealthCheckerOptions {
  /** Name of the data source in health check results, e.g. `postgres:adventureworks` */
  name: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * Creates a critical health checker for the PostgreSQL sales database.
 *
 * @example
 * ```typescript
 * const checker = makeSalesDbHealthChecker(salesDb, { name: 'postgres:adventureworks' });
 * await checker();
 * // { name: 'postgres:adventureworks', status: 'healthy', message: 'Latest order 2014-06-30', latencyMs: 4, critical: true }
 * ```
 */
export const makeSalesDbHealthChecker = (
  db: SalesDbClient,
  options: SalesDbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Sales database check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      const queryPromise = db
        .selectFrom('sales.salesorderheader as soh')
        .select(latestDateOf('soh.orderdate').as('latest_order_date'))
        .executeTakeFirst();

      const row = await Promise.race([queryPromise, timeoutPromise]);
      const latest = row?.latest_order_date ?? null;

      return {
        name,
        status: 'healthy',
        message: latest === null ? 'Sales schema holds no orders' : `Latest order ${latest}`,
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown sales database error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
