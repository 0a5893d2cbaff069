import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

type ReadinessStatus = ReadinessResponse['status'];

/**
 * A checker that throws is reported as a critical failure.
 */
const toCheckResult = (result: PromiseSettledResult<HealthCheckResult>): HealthCheckResult => {
  if (result.status === 'fulfilled') {
    return result.value;
  }
  return {
    name: 'unknown',
    status: 'unhealthy',
    message: result.reason instanceof Error ? result.reason.message : 'Check failed',
    critical: true,
  };
};

/**
 * - Any critical unhealthy check → "unhealthy" (503)
 * - Only non-critical unhealthy checks → "degraded" (200)
 * - Otherwise → "ok" (200)
 */
const overallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const unhealthy = checks.filter((check) => check.status === 'unhealthy');
  if (unhealthy.some((check) => check.critical !== false)) {
    return 'unhealthy';
  }
  return unhealthy.length > 0 ? 'degraded' : 'ok';
};

/**
 * Use case to determine service readiness.
 * Runs every checker in parallel and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const settled = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: overallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(deps.version !== undefined && { version: deps.version }),
  };
}
