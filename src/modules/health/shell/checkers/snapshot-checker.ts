/**
 * Seed snapshot health checker
 *
 * Reports how much data the in-memory snapshot holds. An empty snapshot is
 * a valid state (every report is empty), so the check is non-critical and
 * only flags it.
 */

import type { SalesSnapshot } from '../../../../infra/database/seeds/index.js';
import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface SnapshotHealthCheckerOptions {
  /** Name to identify the snapshot in health check results (default: 'seed-snapshot') */
  name?: string;
}

/**
 * Creates a health checker for the in-memory seed snapshot.
 *
 * @example
 * ```typescript
 * const checker = makeSnapshotHealthChecker(snapshot);
 * await checker();
 * // { name: 'seed-snapshot', status: 'healthy', message: '4 orders, 9 order lines', critical: false }
 * ```
 */
export const makeSnapshotHealthChecker = (
  snapshot: SalesSnapshot,
  options: SnapshotHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'seed-snapshot' } = options;

  return async (): Promise<HealthCheckResult> => {
    const orders = snapshot.orders.size;
    const lines = snapshot.orderLines.length;

    return {
      name,
      status: orders > 0 ? 'healthy' : 'unhealthy',
      message:
        orders > 0
          ? `${String(orders)} orders, ${String(lines)} order lines`
          : 'Snapshot holds no orders',
      critical: false,
    };
  };
};
