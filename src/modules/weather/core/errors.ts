/**
 * Weather Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Record Errors
// ─────────────────────────────────────────────────────────────────────────────

export type MalformedRecordReason = 'field_count' | 'invalid_date' | 'invalid_number';

/**
 * A line that does not parse into an observation.
 */
export interface MalformedRecordError {
  readonly type: 'MalformedRecordError';
  readonly message: string;
  readonly reason: MalformedRecordReason;
  readonly stationId: string;
  readonly line: string;
}

/**
 * A parsed observation the store refused (constraint other than the key).
 */
export interface RecordRejectedError {
  readonly type: 'RecordRejectedError';
  readonly message: string;
  readonly stationId: string;
  readonly date: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Database-related error.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * A station file or directory that exists but cannot be read.
 */
export interface FileReadError {
  readonly type: 'FileReadError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface InputNotFoundError {
  readonly type: 'InputNotFoundError';
  readonly message: string;
  readonly path: string;
}

/**
 * Invalid input path, file name or query parameter.
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

/** Failure of a single insert */
export type StorageError = DatabaseError | RecordRejectedError;

/** Failure of a whole station file */
export type IngestionError = InputNotFoundError | InvalidInputError | FileReadError | DatabaseError;

/** Failure of a batch run before any file is ingested */
export type BatchInputError = InputNotFoundError | InvalidInputError | FileReadError;

/** Failure of a read query */
export type QueryError = InvalidInputError | DatabaseError;

export type WeatherError =
  | MalformedRecordError
  | RecordRejectedError
  | DatabaseError
  | FileReadError
  | InputNotFoundError
  | InvalidInputError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createMalformedRecordError = (
  reason: MalformedRecordReason,
  stationId: string,
  line: string,
  message: string
): MalformedRecordError => ({
  type: 'MalformedRecordError',
  message,
  reason,
  stationId,
  line,
});

export const createRecordRejectedError = (
  stationId: string,
  date: string,
  cause?: unknown
): RecordRejectedError => ({
  type: 'RecordRejectedError',
  message: `Observation ${stationId}/${date} was rejected by the store`,
  stationId,
  date,
  cause,
});

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createFileReadError = (path: string, cause?: unknown): FileReadError => ({
  type: 'FileReadError',
  message: `Failed to read ${path}${cause instanceof Error ? `: ${cause.message}` : ''}`,
  path,
  cause,
});

export const createInputNotFoundError = (path: string): InputNotFoundError => ({
  type: 'InputNotFoundError',
  message: `Input path not found: ${path}`,
  path,
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const WEATHER_ERROR_HTTP_STATUS: Record<WeatherError['type'], number> = {
  MalformedRecordError: 400,
  RecordRejectedError: 422,
  DatabaseError: 500,
  FileReadError: 500,
  InputNotFoundError: 404,
  InvalidInputError: 400,
};

export const getHttpStatusForError = (error: WeatherError): number => {
  return WEATHER_ERROR_HTTP_STATUS[error.type];
};
