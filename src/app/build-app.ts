/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import {
  makeDbHealthChecker,
  makeHealthRoutes,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  makeWeatherRepo,
  makeWeatherRoutes,
  type WeatherRepository,
} from '../modules/weather/index.js';

import type { WeatherDbClient } from '../infra/database/client.js';
import type { Logger } from 'pino';

/** Service name reported by GET /health */
export const SERVICE_NAME = 'weather-data-pipeline';

/**
 * Application dependencies
 */
export interface AppDeps {
  db: WeatherDbClient;
  logger: Logger;
  /** Replaces the Kysely repository, e.g. with a failing stand-in */
  weatherRepo?: WeatherRepository;
  /** Extra readiness checks, run next to the database check */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version = '0.0.0' } = options;
  const { db, logger } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Registered before the route plugins so their contexts inherit it
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Query string that failed schema validation
    if (error.validation != null) {
      request.log.warn({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'InvalidInputError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      service: SERVICE_NAME,
      version,
      checkers: [makeDbHealthChecker(db), ...(deps.healthCheckers ?? [])],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Weather API
  // ─────────────────────────────────────────────────────────────────────────────
  const weatherRepo = deps.weatherRepo ?? makeWeatherRepo({ db, logger });

  await app.register(makeWeatherRoutes({ weatherRepo }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
