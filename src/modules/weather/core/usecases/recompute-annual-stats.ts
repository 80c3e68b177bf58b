/**
 * Recompute Annual Stats Use Case
 *
 * Rebuilds the annual statistics table from the stored observations.
 */

import { ok, err, type Result } from 'neverthrow';

import type { DatabaseError } from '../errors.js';
import type { WeatherRepository } from '../ports.js';
import type { RecomputeResult } from '../types.js';
import type { Logger } from 'pino';

export interface RecomputeAnnualStatsDeps {
  weatherRepo: WeatherRepository;
  logger: Logger;
}

/**
 * Aggregates every station-year and swaps the result in atomically.
 * Missing values are left out per metric; a metric with no recorded value
 * for the year is stored as null.
 */
export const recomputeAnnualStats = async (
  deps: RecomputeAnnualStatsDeps
): Promise<Result<RecomputeResult, DatabaseError>> => {
  const { weatherRepo, logger } = deps;
  const start = performance.now();

  logger.info('Starting annual statistics computation');

  const aggregatesResult = await weatherRepo.computeAnnualAggregates();
  if (aggregatesResult.isErr()) {
    logger.error({ err: aggregatesResult.error.cause }, aggregatesResult.error.message);
    return err(aggregatesResult.error);
  }

  const replaceResult = await weatherRepo.replaceAnnualStats(aggregatesResult.value);
  if (replaceResult.isErr()) {
    logger.error({ err: replaceResult.error.cause }, replaceResult.error.message);
    return err(replaceResult.error);
  }

  const result: RecomputeResult = {
    recordsStored: replaceResult.value,
    durationMs: performance.now() - start,
  };

  logger.info(
    { recordsStored: result.recordsStored, durationMs: result.durationMs },
    'Annual statistics computation completed'
  );

  return ok(result);
};
