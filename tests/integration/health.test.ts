/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp, SERVICE_NAME } from '@/app/build-app.js';

import {
  createTestDb,
  makeFailingHealthChecker,
  makeHealthChecker,
} from '../fixtures/builders.js';
import { makeSilentLogger } from '../fixtures/fakes.js';

import type { WeatherDbClient } from '@/infra/database/client.js';
import type { HealthChecker } from '@/modules/health/index.js';
import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;
  let db: WeatherDbClient | undefined;

  const startApp = async (healthCheckers: HealthChecker[] = []): Promise<FastifyInstance> => {
    db = await createTestDb();
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: { db, logger: makeSilentLogger(), healthCheckers },
      version: '1.2.3',
    });
    return app;
  };

  afterEach(async () => {
    await app?.close();
    await db?.destroy();
    app = undefined;
    db = undefined;
  });

  describe('GET /health', () => {
    it('returns the service name and version', async () => {
      const server = await startApp();

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body).toMatchObject({ status: 'healthy', service: SERVICE_NAME, version: '1.2.3' });
      expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
    });
  });

  describe('GET /health/live', () => {
    it('returns 200 with status ok', async () => {
      const server = await startApp([makeFailingHealthChecker('down')]);

      const response = await server.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });
  });

  describe('GET /health/ready', () => {
    it('returns 200 when the database answers', async () => {
      const server = await startApp();

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.version).toBe('1.2.3');
      expect(body.checks).toHaveLength(1);
      expect(body.checks[0]).toMatchObject({ name: 'database', status: 'healthy', critical: true });
    });

    it('reports degraded when only a non-critical check fails', async () => {
      const server = await startApp([
        makeHealthChecker({ name: 'disk', status: 'unhealthy', critical: false }),
      ]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('degraded');
    });

    it('returns 503 when a checker throws', async () => {
      const server = await startApp([makeFailingHealthChecker('Connection refused')]);

      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.status).toBe('unhealthy');
      expect(body.checks[1]).toEqual({
        name: 'unknown',
        status: 'unhealthy',
        message: 'Connection refused',
        critical: true,
      });
    });
  });
});
