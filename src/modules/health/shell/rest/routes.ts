/**
 * Health check routes
 *
 * Endpoints:
 * - GET /health       - Service name, version and current time
 * - GET /health/live  - Liveness probe (is the process alive?)
 * - GET /health/ready - Readiness probe (can the database be reached?)
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  ServiceInfoResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
  type ServiceInfoResponse,
} from '../../core/types.js';
import { getReadiness } from '../../core/usecases/get-readiness.js';

import type { HealthChecker } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeHealthRoutesDeps {
  service: string;
  version: string;
  checkers?: HealthChecker[];
}

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: MakeHealthRoutesDeps): FastifyPluginAsync => {
  const { service, version, checkers = [] } = deps;
  const startTime = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: ServiceInfoResponse }>(
      '/health',
      {
        schema: {
          response: {
            200: ServiceInfoResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({
          status: 'healthy',
          service,
          version,
          timestamp: new Date().toISOString(),
        });
      }
    );

    /**
     * Always 200 while the process runs; dependencies are the readiness
     * probe's concern.
     */
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      {
        schema: {
          response: {
            200: LivenessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const response = await getReadiness(
          { version, checkers },
          {
            uptime: Math.floor((Date.now() - startTime) / 1000),
            timestamp: new Date().toISOString(),
          }
        );

        return reply.status(response.status === 'unhealthy' ? 503 : 200).send(response);
      }
    );
  };
};
