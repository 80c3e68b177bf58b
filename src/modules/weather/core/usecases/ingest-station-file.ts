/**
 * Ingest Station File Use Case
 *
 * Loads one station file into the observation table. All rows of the file
 * are committed together; bad lines are counted and skipped.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInputNotFoundError,
  createInvalidInputError,
  type DatabaseError,
  type FileReadError,
  type IngestionError,
} from '../errors.js';
import { isValidStationId, parseObservationLine, stationIdFromPath } from '../parser.js';

import type { StationFileSource, WeatherRepository } from '../ports.js';
import type { FileStats } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface IngestStationFileDeps {
  weatherRepo: WeatherRepository;
  files: StationFileSource;
  logger: Logger;
}

export interface IngestStationFileInput {
  filePath: string;
}

interface LineCounters {
  recordsProcessed: number;
  recordsIngested: number;
  recordsSkipped: number;
  errors: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ingests a single station file.
 *
 * Flow:
 * 1. Derive and validate the station id from the file name
 * 2. Check the file exists
 * 3. Inside one transaction, read the file line by line and insert every
 *    non-blank line
 *    - malformed line or refused row: counted as an error, next line
 *    - duplicate key: counted as skipped
 *    - read failure or any other storage failure: the file is rolled back
 *      and fails
 */
export const ingestStationFile = async (
  deps: IngestStationFileDeps,
  input: IngestStationFileInput
): Promise<Result<FileStats, IngestionError>> => {
  const { weatherRepo, files } = deps;
  const { filePath } = input;

  const startedAt = new Date();
  const start = performance.now();
  const stationId = stationIdFromPath(filePath);
  const log = deps.logger.child({ stationId, filePath });

  if (!isValidStationId(stationId)) {
    return err(
      createInvalidInputError('filePath', `Invalid station id '${stationId}' in ${filePath}`)
    );
  }

  const kindResult = await files.inspect(filePath);
  if (kindResult.isErr()) {
    return err(kindResult.error);
  }
  if (kindResult.value === null) {
    return err(createInputNotFoundError(filePath));
  }

  log.info('Starting ingestion for station');

  const batchResult = await weatherRepo.withObservationBatch(
    async (writer): Promise<Result<LineCounters, DatabaseError | FileReadError>> => {
      const counters: LineCounters = {
        recordsProcessed: 0,
        recordsIngested: 0,
        recordsSkipped: 0,
        errors: 0,
      };

      for await (const lineResult of files.readLines(filePath)) {
        if (lineResult.isErr()) {
          return err(lineResult.error);
        }

        const line = lineResult.value.trim();
        if (line === '') {
          continue;
        }

        counters.recordsProcessed += 1;

        const parsed = parseObservationLine(line, stationId);
        if (parsed.isErr()) {
          counters.errors += 1;
          log.warn({ reason: parsed.error.reason, line }, parsed.error.message);
          continue;
        }

        const inserted = await writer.insertObservation(parsed.value);
        if (inserted.isErr()) {
          if (inserted.error.type === 'RecordRejectedError') {
            counters.errors += 1;
            log.warn({ date: inserted.error.date }, inserted.error.message);
            continue;
          }
          return err(inserted.error);
        }

        if (inserted.value === 'inserted') {
          counters.recordsIngested += 1;
        } else {
          counters.recordsSkipped += 1;
          log.debug({ date: parsed.value.date }, 'Duplicate record skipped');
        }
      }

      return ok(counters);
    }
  );

  if (batchResult.isErr()) {
    log.error({ err: batchResult.error.cause }, batchResult.error.message);
    return err(batchResult.error);
  }

  const finishedAt = new Date();
  const stats: FileStats = {
    stationId,
    filePath,
    startedAt,
    finishedAt,
    durationMs: performance.now() - start,
    ...batchResult.value,
  };

  log.info(
    {
      ingested: stats.recordsIngested,
      skipped: stats.recordsSkipped,
      errors: stats.errors,
      durationMs: stats.durationMs,
    },
    'Completed ingestion for station'
  );

  return ok(stats);
};
