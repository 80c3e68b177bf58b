/**
 * Ingest Weather Data Use Case
 *
 * Batch entry point: ingests a single station file or every station file
 * of a directory. A failing file is recorded and the run moves on.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInputNotFoundError,
  createInvalidInputError,
  type BatchInputError,
} from '../errors.js';
import { DATA_FILE_EXTENSION, type FailedFile, type FileStats, type RunStats } from '../types.js';
import { ingestStationFile } from './ingest-station-file.js';

import type { StationFileSource, WeatherRepository } from '../ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface IngestWeatherDataDeps {
  weatherRepo: WeatherRepository;
  files: StationFileSource;
  logger: Logger;
}

export interface IngestWeatherDataInput {
  /** A station file or a directory of station files */
  inputPath: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const sum = (items: readonly FileStats[], pick: (stats: FileStats) => number): number =>
  items.reduce((total, item) => total + pick(item), 0);

/**
 * Resolves the input path into the ordered list of files to ingest.
 */
const resolveDataFiles = async (
  files: StationFileSource,
  inputPath: string
): Promise<Result<string[], BatchInputError>> => {
  const kindResult = await files.inspect(inputPath);
  if (kindResult.isErr()) {
    return err(kindResult.error);
  }

  const kind = kindResult.value;
  if (kind === null) {
    return err(createInputNotFoundError(inputPath));
  }

  if (kind === 'file') {
    if (!inputPath.endsWith(DATA_FILE_EXTENSION)) {
      return err(
        createInvalidInputError(
          'inputPath',
          `Expected a ${DATA_FILE_EXTENSION} file, got ${inputPath}`
        )
      );
    }
    return ok([inputPath]);
  }

  const listResult = await files.listDataFiles(inputPath, DATA_FILE_EXTENSION);
  if (listResult.isErr()) {
    return err(listResult.error);
  }
  if (listResult.value.length === 0) {
    return err(
      createInvalidInputError('inputPath', `No weather data files found in ${inputPath}`)
    );
  }

  return ok(listResult.value);
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ingests weather data from a file or directory.
 *
 * Files are processed one at a time in lexicographic order. The call only
 * fails when the input itself is unusable; per-file failures end up in
 * `failedFiles`.
 */
export const ingestWeatherData = async (
  deps: IngestWeatherDataDeps,
  input: IngestWeatherDataInput
): Promise<Result<RunStats, BatchInputError>> => {
  const { inputPath } = input;
  const log = deps.logger.child({ inputPath });

  const startedAt = new Date();
  const start = performance.now();

  const filesResult = await resolveDataFiles(deps.files, inputPath);
  if (filesResult.isErr()) {
    log.error({ error: filesResult.error }, filesResult.error.message);
    return err(filesResult.error);
  }

  const dataFiles = filesResult.value;
  log.info({ fileCount: dataFiles.length }, 'Starting weather data ingestion');

  const fileStats: FileStats[] = [];
  const failedFiles: FailedFile[] = [];

  for (const filePath of dataFiles) {
    const result = await ingestStationFile(deps, { filePath });
    if (result.isErr()) {
      log.error({ filePath, error: result.error }, 'Failed to ingest station file');
      failedFiles.push({ filePath, error: result.error });
      continue;
    }
    fileStats.push(result.value);
  }

  const stats: RunStats = {
    inputPath,
    startedAt,
    finishedAt: new Date(),
    durationMs: performance.now() - start,
    filesProcessed: dataFiles.length,
    filesSuccessful: fileStats.length,
    filesFailed: failedFiles.length,
    totalRecordsProcessed: sum(fileStats, (s) => s.recordsProcessed),
    totalRecordsIngested: sum(fileStats, (s) => s.recordsIngested),
    totalRecordsSkipped: sum(fileStats, (s) => s.recordsSkipped),
    totalErrors: sum(fileStats, (s) => s.errors),
    fileStats,
    failedFiles,
  };

  log.info(
    {
      filesProcessed: stats.filesProcessed,
      filesSuccessful: stats.filesSuccessful,
      filesFailed: stats.filesFailed,
      recordsProcessed: stats.totalRecordsProcessed,
      recordsIngested: stats.totalRecordsIngested,
      recordsSkipped: stats.totalRecordsSkipped,
      errors: stats.totalErrors,
      durationMs: stats.durationMs,
    },
    'Weather data ingestion completed'
  );

  return ok(stats);
};
