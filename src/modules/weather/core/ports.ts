/**
 * Weather Module - Port Interfaces
 *
 * Storage and file-system contracts that the shell layer must implement.
 */

import type { DatabaseError, FileReadError, StorageError } from './errors.js';
import type {
  AnnualStat,
  AnnualStatFilter,
  InsertOutcome,
  Observation,
  ObservationFilter,
  PageRequest,
  PageResult,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Weather Repository (storage gateway)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Writes observations inside an open batch transaction.
 */
export interface ObservationWriter {
  /**
   * Inserts an observation unless its (station, date) key already exists.
   * A refused row (RecordRejectedError) leaves the batch usable;
   * a DatabaseError means the batch must be abandoned.
   */
  insertObservation(observation: Observation): Promise<Result<InsertOutcome, StorageError>>;
}

/**
 * Sole owner of the observation and annual statistics tables.
 */
export interface WeatherRepository {
  /**
   * Runs `work` inside one transaction. Commits when it returns ok,
   * rolls back when it returns an error or throws. An error returned by
   * `work` is passed through unchanged.
   */
  withObservationBatch<T, E = DatabaseError>(
    work: (writer: ObservationWriter) => Promise<Result<T, E>>
  ): Promise<Result<T, E | DatabaseError>>;

  /**
   * Replaces the whole annual statistics table in one transaction.
   * @returns Number of rows written
   */
  replaceAnnualStats(rows: readonly AnnualStat[]): Promise<Result<number, DatabaseError>>;

  /**
   * Aggregates stored observations per station and year, skipping
   * missing values per metric. Ordered by station, then year.
   */
  computeAnnualAggregates(): Promise<Result<AnnualStat[], DatabaseError>>;

  countObservations(filter: ObservationFilter): Promise<Result<number, DatabaseError>>;

  queryObservations(
    filter: ObservationFilter,
    page: PageRequest
  ): Promise<Result<PageResult<Observation>, DatabaseError>>;

  countAnnualStats(filter: AnnualStatFilter): Promise<Result<number, DatabaseError>>;

  queryAnnualStats(
    filter: AnnualStatFilter,
    page: PageRequest
  ): Promise<Result<PageResult<AnnualStat>, DatabaseError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Station File Source
// ─────────────────────────────────────────────────────────────────────────────

export type PathKind = 'file' | 'directory';

/**
 * Read-only access to station data files.
 */
export interface StationFileSource {
  /**
   * @returns The kind of entry at `path`, or null when nothing exists there
   */
  inspect(path: string): Promise<Result<PathKind | null, FileReadError>>;

  /**
   * Lists entries of `dir` whose name ends with `extension`,
   * as full paths in lexicographic order.
   */
  listDataFiles(dir: string, extension: string): Promise<Result<string[], FileReadError>>;

  /**
   * Streams a file as UTF-8 lines (line terminators removed).
   * A read failure is yielded as the last item.
   */
  readLines(path: string): AsyncIterable<Result<string, FileReadError>>;
}
