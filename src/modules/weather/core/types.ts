/**
 * Weather Module - Domain Types
 *
 * Observations, derived annual statistics, ingestion statistics and the
 * constants shared by the parser, the ingestors and the query layer.
 */

import type { IngestionError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Marker for a value that was not recorded by the station */
export const MISSING_VALUE = -9999;

/** Extension of station data files; the base name is the station id */
export const DATA_FILE_EXTENSION = '.txt';

/** Number of tab-separated fields in a record line */
export const RECORD_FIELD_COUNT = 4;

/** Maximum station id length */
export const MAX_STATION_ID_LENGTH = 32;

/** Station ids accepted by the ingestors */
export const STATION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Station ids accepted by the query filters */
export const QUERY_STATION_ID_PATTERN = /^[A-Za-z0-9_-]{3,32}$/;

/** Divisor turning tenths of a degree into degrees */
export const TENTHS_PER_DEGREE = 10;

/** Divisor turning tenths of a millimeter into centimeters */
export const TENTHS_MM_PER_CM = 100;

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One daily reading for one station, in the units of the source files.
 */
export interface Observation {
  readonly stationId: string;
  /** ISO 8601 date (YYYY-MM-DD) */
  readonly date: string;
  /** Tenths of a degree Celsius, or MISSING_VALUE */
  readonly maxTemp: number;
  /** Tenths of a degree Celsius, or MISSING_VALUE */
  readonly minTemp: number;
  /** Tenths of a millimeter, or MISSING_VALUE */
  readonly precipitation: number;
}

/**
 * Yearly summary for one station, derived from its observations.
 * A metric is null when every observation of the year is missing it.
 */
export interface AnnualStat {
  readonly stationId: string;
  readonly year: number;
  /** Degrees Celsius, 2 decimals */
  readonly avgMaxTemp: number | null;
  /** Degrees Celsius, 2 decimals */
  readonly avgMinTemp: number | null;
  /** Centimeters, 2 decimals */
  readonly totalPrecipitation: number | null;
}

/** Outcome of a single idempotent insert */
export type InsertOutcome = 'inserted' | 'duplicate';

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion Statistics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Counters for one ingested station file.
 * recordsProcessed = recordsIngested + recordsSkipped + errors
 */
export interface FileStats {
  readonly stationId: string;
  readonly filePath: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
  /** Non-blank lines read */
  readonly recordsProcessed: number;
  /** Rows newly written */
  readonly recordsIngested: number;
  /** Rows already present (duplicate station/date) */
  readonly recordsSkipped: number;
  /** Malformed lines and rows refused by the store */
  readonly errors: number;
}

/**
 * A station file that could not be ingested, with the cause.
 */
export interface FailedFile {
  readonly filePath: string;
  readonly error: IngestionError;
}

/**
 * Totals for one batch run over a file or a directory.
 */
export interface RunStats {
  readonly inputPath: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
  readonly filesProcessed: number;
  readonly filesSuccessful: number;
  readonly filesFailed: number;
  readonly totalRecordsProcessed: number;
  readonly totalRecordsIngested: number;
  readonly totalRecordsSkipped: number;
  readonly totalErrors: number;
  readonly fileStats: readonly FileStats[];
  readonly failedFiles: readonly FailedFile[];
}

/**
 * Result of an annual statistics recomputation.
 */
export interface RecomputeResult {
  /** Station-year rows now in the derived table */
  readonly recordsStored: number;
  readonly durationMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Query Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ObservationFilter {
  readonly stationId?: string;
  /** ISO 8601 date (YYYY-MM-DD) */
  readonly date?: string;
}

export interface AnnualStatFilter {
  readonly stationId?: string;
  readonly year?: number;
}

/** 1-based page request */
export interface PageRequest {
  readonly page: number;
  readonly pageSize: number;
}

/**
 * One page of rows plus the number of rows matching the filter,
 * both read by the same statement.
 */
export interface PageResult<T> {
  readonly rows: T[];
  readonly totalCount: number;
}

export interface PaginationInfo {
  readonly page: number;
  readonly pageSize: number;
  readonly totalPages: number;
  readonly totalRecords: number;
}

export interface Paginated<T> {
  readonly data: T[];
  readonly pagination: PaginationInfo;
}
