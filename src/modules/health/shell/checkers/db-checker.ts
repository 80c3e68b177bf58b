/**
 * Database health checker
 *
 * Runs `SELECT 1` against the database, bounded by a timeout.
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

/** Default timeout for database health check in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name to identify this database in health check results */
  name?: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * Creates a health checker for a Kysely database client.
 *
 * @example
 * const dbChecker = makeDbHealthChecker(db);
 * await dbChecker(); // { name: 'database', status: 'healthy', latencyMs: 1, critical: true }
 */
export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'database', timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Database health check timed out after ${String(timeoutMs)}ms`));
      }, timeoutMs);
    });

    try {
      await Promise.race([sql`SELECT 1`.execute(db), timeoutPromise]);

      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
