#!/usr/bin/env tsx

/**
 * Weather Ingestion Script
 *
 * Loads station files into the observation table. Re-running over the same
 * files only counts the rows as skipped.
 *
 * Usage:
 *   npm run ingest                      # ingest WEATHER_DATA_DIR
 *   npm run ingest -- data/wx_data      # ingest every .txt file of a directory
 *   npm run ingest -- data/wx_data/USC00110072.txt
 *
 * Exit code is 1 when the input is unusable or any file failed.
 */

import { ensureWeatherSchema } from '../src/infra/database/schema.js';
import { createRuntime } from '../src/infra/runtime.js';
import {
  EXIT_FAILURE,
  makeFsStationFileSource,
  makeWeatherRepo,
  runIngestCommand,
} from '../src/modules/weather/index.js';

const USAGE = 'Usage: npm run ingest -- [file-or-directory]';

const args = process.argv.slice(2);

if (args.includes('--help') || args.includes('-h')) {
  console.log(USAGE);
  process.exit(0);
}

const { config, logger, db } = createRuntime(process.env, 'weather-ingest');
const inputPath = args[0] ?? config.ingestion.dataDir;

try {
  await ensureWeatherSchema(db);

  process.exitCode = await runIngestCommand(
    {
      weatherRepo: makeWeatherRepo({ db, logger }),
      files: makeFsStationFileSource(),
      logger,
    },
    { inputPath }
  );
} catch (error) {
  logger.error({ err: error }, 'Ingestion crashed');
  process.exitCode = EXIT_FAILURE;
} finally {
  await db.destroy();
}
