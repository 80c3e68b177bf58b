import { describe, it, expect } from 'vitest';

import { determineOverallStatus, mapCheckResults } from '@/modules/health/core/logic.js';
import { getReadiness } from '@/modules/health/core/usecases/get-readiness.js';

import {
  makeFailingHealthChecker,
  makeHealthCheckResult,
  makeHealthChecker,
} from '../../fixtures/builders.js';

import type { HealthCheckResult } from '@/modules/health/core/types.js';

describe('getReadiness', () => {
  const timestamp = '2024-01-01T00:00:00.000Z';
  const uptime = 100;

  it('returns ok when all checks are healthy', async () => {
    const result = await getReadiness(
      { checkers: [makeHealthChecker({ name: 'database' })] },
      { uptime, timestamp }
    );

    expect(result).toEqual({
      status: 'ok',
      timestamp,
      uptime,
      checks: [{ name: 'database', status: 'healthy' }],
    });
  });

  it('includes version if provided', async () => {
    const result = await getReadiness({ checkers: [], version: '1.2.3' }, { uptime, timestamp });

    expect(result.version).toBe('1.2.3');
  });

  it('is unhealthy when a critical check fails', async () => {
    const result = await getReadiness(
      {
        checkers: [
          makeHealthChecker({ name: 'database', status: 'unhealthy', critical: true }),
          makeHealthChecker({ name: 'other' }),
        ],
      },
      { uptime, timestamp }
    );

    expect(result.status).toBe('unhealthy');
  });

  it('is degraded when only non-critical checks fail', async () => {
    const result = await getReadiness(
      { checkers: [makeHealthChecker({ name: 'disk', status: 'unhealthy', critical: false })] },
      { uptime, timestamp }
    );

    expect(result.status).toBe('degraded');
  });

  it('treats a throwing checker as a critical failure', async () => {
    const result = await getReadiness(
      { checkers: [makeFailingHealthChecker('Connection refused')] },
      { uptime, timestamp }
    );

    expect(result.status).toBe('unhealthy');
    expect(result.checks).toEqual([
      { name: 'unknown', status: 'unhealthy', message: 'Connection refused', critical: true },
    ]);
  });
});

describe('health logic', () => {
  it('maps settled results', () => {
    const input: PromiseSettledResult<HealthCheckResult>[] = [
      { status: 'fulfilled', value: makeHealthCheckResult({ name: 'db' }) },
      { status: 'rejected', reason: 'not an error' },
    ];

    expect(mapCheckResults(input)).toEqual([
      { name: 'db', status: 'healthy' },
      { name: 'unknown', status: 'unhealthy', message: 'Check failed', critical: true },
    ]);
  });

  it('defaults unmarked failures to critical', () => {
    expect(determineOverallStatus([makeHealthCheckResult({ status: 'unhealthy' })])).toBe(
      'unhealthy'
    );
    expect(determineOverallStatus([])).toBe('ok');
  });
});
