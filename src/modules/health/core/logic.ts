import type { HealthCheckResult, ReadinessStatus } from './types.js';

/**
 * Maps settled checker promises to results.
 * A checker that throws counts as a critical failure.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
      critical: true,
    };
  });
};

/**
 * Overall readiness:
 * - any critical unhealthy check: "unhealthy" (503)
 * - only non-critical unhealthy checks: "degraded" (200)
 * - otherwise "ok"
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const unhealthy = checks.filter((c) => c.status === 'unhealthy');
  if (unhealthy.some((c) => c.critical !== false)) {
    return 'unhealthy';
  }
  return unhealthy.length > 0 ? 'degraded' : 'ok';
};
