/**
 * Weather Module REST Routes
 *
 * Read-only API over observations and annual statistics.
 * - GET /api/weather: Daily observations
 * - GET /api/weather/stats: Annual statistics per station
 */

import {
  AnnualStatListResponseSchema,
  AnnualStatQuerySchema,
  ErrorResponseSchema,
  ObservationListResponseSchema,
  ObservationQuerySchema,
  type AnnualStatItem,
  type AnnualStatQuery,
  type ObservationItem,
  type ObservationQuery,
} from './schemas.js';
import { getHttpStatusForError, type WeatherError } from '../../core/errors.js';
import { listAnnualStats } from '../../core/usecases/list-annual-stats.js';
import { listObservations } from '../../core/usecases/list-observations.js';

import type { WeatherRepository } from '../../core/ports.js';
import type { AnnualStat, Observation } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for weather routes.
 */
export interface MakeWeatherRoutesDeps {
  weatherRepo: WeatherRepository;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toObservationItem = (observation: Observation): ObservationItem => ({
  station_id: observation.stationId,
  date: observation.date,
  max_temp: observation.maxTemp,
  min_temp: observation.minTemp,
  precipitation: observation.precipitation,
});

const toAnnualStatItem = (stat: AnnualStat): AnnualStatItem => ({
  station_id: stat.stationId,
  year: stat.year,
  avg_max_temp: stat.avgMaxTemp,
  avg_min_temp: stat.avgMinTemp,
  total_precipitation: stat.totalPrecipitation,
});

const elapsedMs = (start: number): number => Math.round((performance.now() - start) * 100) / 100;

function sendError(reply: FastifyReply, error: WeatherError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates weather REST routes.
 */
export const makeWeatherRoutes = (deps: MakeWeatherRoutesDeps): FastifyPluginAsync => {
  const { weatherRepo } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/weather - Daily observations
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ObservationQuery }>(
      '/api/weather',
      {
        schema: {
          querystring: ObservationQuerySchema,
          response: {
            200: ObservationListResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const start = performance.now();
        const { station_id, date, page, pageSize } = request.query;

        const result = await listObservations(
          { weatherRepo },
          {
            filter: {
              ...(station_id !== undefined && { stationId: station_id }),
              ...(date !== undefined && { date }),
            },
            ...(page !== undefined && { page }),
            ...(pageSize !== undefined && { pageSize }),
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: result.value.data.map(toObservationItem),
          pagination: result.value.pagination,
          queryTime: elapsedMs(start),
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/weather/stats - Annual statistics
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: AnnualStatQuery }>(
      '/api/weather/stats',
      {
        schema: {
          querystring: AnnualStatQuerySchema,
          response: {
            200: AnnualStatListResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const start = performance.now();
        const { station_id, year, page, pageSize } = request.query;

        const result = await listAnnualStats(
          { weatherRepo },
          {
            filter: {
              ...(station_id !== undefined && { stationId: station_id }),
              ...(year !== undefined && { year }),
            },
            ...(page !== undefined && { page }),
            ...(pageSize !== undefined && { pageSize }),
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: result.value.data.map(toAnnualStatItem),
          pagination: result.value.pagination,
          queryTime: elapsedMs(start),
        });
      }
    );
  };
};
