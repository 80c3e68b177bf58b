#!/usr/bin/env tsx

/**
 * Annual Statistics Script
 *
 * Recomputes the per-station yearly statistics from every stored
 * observation and swaps them in atomically. Run after ingestion.
 *
 * Usage:
 *   npm run analyze
 */

import { ensureWeatherSchema } from '../src/infra/database/schema.js';
import { createRuntime } from '../src/infra/runtime.js';
import { EXIT_FAILURE, makeWeatherRepo, runAnalyzeCommand } from '../src/modules/weather/index.js';

const { logger, db } = createRuntime(process.env, 'weather-analyze');

try {
  await ensureWeatherSchema(db);
  process.exitCode = await runAnalyzeCommand({
    weatherRepo: makeWeatherRepo({ db, logger }),
    logger,
  });
} catch (error) {
  logger.error({ err: error }, 'Analysis crashed');
  process.exitCode = EXIT_FAILURE;
} finally {
  await db.destroy();
}
