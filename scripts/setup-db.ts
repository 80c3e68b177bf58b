#!/usr/bin/env tsx

/**
 * Database Setup Script
 *
 * Creates the observation and annual statistics tables when missing.
 *
 * Usage:
 *   npm run db:setup
 *
 * Environment:
 *   DATABASE_URL: postgres:// URL or SQLite file path (default: db/weather_data.db)
 */

import { ensureWeatherSchema } from '../src/infra/database/schema.js';
import { createRuntime } from '../src/infra/runtime.js';

const { config, logger, db } = createRuntime(process.env, 'weather-db-setup');

try {
  await ensureWeatherSchema(db);
  logger.info({ database: config.database.url }, 'Weather schema is ready');
} catch (error) {
  logger.error({ err: error }, 'Failed to create weather schema');
  process.exitCode = 1;
} finally {
  await db.destroy();
}
