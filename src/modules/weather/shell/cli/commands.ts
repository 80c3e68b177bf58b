/**
 * Weather operator commands
 *
 * Thin wrappers over the ingestion and aggregation use cases that turn
 * their results into process exit codes. The scripts under scripts/ wire
 * these to the real database and file system.
 */

import { ingestWeatherData } from '../../core/usecases/ingest-weather-data.js';
import { recomputeAnnualStats } from '../../core/usecases/recompute-annual-stats.js';

import type { StationFileSource, WeatherRepository } from '../../core/ports.js';
import type { RunStats } from '../../core/types.js';
import type { Logger } from 'pino';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface WeatherCommandDeps {
  weatherRepo: WeatherRepository;
  files: StationFileSource;
  logger: Logger;
}

/**
 * Flattens run statistics for the final log line.
 */
export const summarizeRun = (stats: RunStats) => ({
  inputPath: stats.inputPath,
  filesProcessed: stats.filesProcessed,
  filesSuccessful: stats.filesSuccessful,
  filesFailed: stats.filesFailed,
  recordsProcessed: stats.totalRecordsProcessed,
  recordsIngested: stats.totalRecordsIngested,
  recordsSkipped: stats.totalRecordsSkipped,
  errors: stats.totalErrors,
  durationMs: Math.round(stats.durationMs),
  failedFiles: stats.failedFiles.map((failed) => ({
    filePath: failed.filePath,
    error: failed.error.type,
    message: failed.error.message,
  })),
});

/**
 * Ingests a file or directory.
 * Exits with failure when the input is unusable or any file failed.
 */
export const runIngestCommand = async (
  deps: WeatherCommandDeps,
  input: { inputPath: string }
): Promise<number> => {
  const result = await ingestWeatherData(deps, input);

  if (result.isErr()) {
    deps.logger.error({ error: result.error }, `Ingestion aborted: ${result.error.message}`);
    return EXIT_FAILURE;
  }

  const summary = summarizeRun(result.value);
  if (result.value.filesFailed > 0) {
    deps.logger.error({ summary }, 'Ingestion finished with failed files');
    return EXIT_FAILURE;
  }

  deps.logger.info({ summary }, 'Ingestion finished');
  return EXIT_SUCCESS;
};

/**
 * Recomputes every annual statistic.
 */
export const runAnalyzeCommand = async (
  deps: Pick<WeatherCommandDeps, 'weatherRepo' | 'logger'>
): Promise<number> => {
  const result = await recomputeAnnualStats(deps);

  if (result.isErr()) {
    deps.logger.error({ error: result.error }, `Analysis failed: ${result.error.message}`);
    return EXIT_FAILURE;
  }

  deps.logger.info(
    { recordsStored: result.value.recordsStored, durationMs: Math.round(result.value.durationMs) },
    'Analysis finished'
  );
  return EXIT_SUCCESS;
};
