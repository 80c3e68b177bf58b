/**
 * Weather Module - Public API
 *
 * Ingestion of station files, annual aggregation and paginated reads.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Observation,
  AnnualStat,
  InsertOutcome,
  FileStats,
  FailedFile,
  RunStats,
  RecomputeResult,
  ObservationFilter,
  AnnualStatFilter,
  PageRequest,
  PageResult,
  PaginationInfo,
  Paginated,
} from './core/types.js';

export {
  // Constants
  MISSING_VALUE,
  DATA_FILE_EXTENSION,
  RECORD_FIELD_COUNT,
  MAX_STATION_ID_LENGTH,
  STATION_ID_PATTERN,
  QUERY_STATION_ID_PATTERN,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  WeatherError,
  MalformedRecordError,
  MalformedRecordReason,
  RecordRejectedError,
  DatabaseError,
  FileReadError,
  InputNotFoundError,
  InvalidInputError,
  StorageError,
  IngestionError,
  BatchInputError,
  QueryError,
} from './core/errors.js';

export {
  // Error constructors
  createMalformedRecordError,
  createRecordRejectedError,
  createDatabaseError,
  createFileReadError,
  createInputNotFoundError,
  createInvalidInputError,
  // HTTP status mapping
  WEATHER_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ObservationWriter,
  WeatherRepository,
  StationFileSource,
  PathKind,
} from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Record Parser
// ─────────────────────────────────────────────────────────────────────────────

export {
  parseObservationLine,
  toIsoDate,
  isIsoDate,
  parseInteger,
  isValidStationId,
  stationIdFromPath,
} from './core/parser.js';

export { validateObservationFilter, validateAnnualStatFilter } from './core/filters.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  ingestStationFile,
  type IngestStationFileDeps,
  type IngestStationFileInput,
} from './core/usecases/ingest-station-file.js';

export {
  ingestWeatherData,
  type IngestWeatherDataDeps,
  type IngestWeatherDataInput,
} from './core/usecases/ingest-weather-data.js';

export {
  recomputeAnnualStats,
  type RecomputeAnnualStatsDeps,
} from './core/usecases/recompute-annual-stats.js';

export {
  listObservations,
  type ListObservationsDeps,
  type ListObservationsInput,
} from './core/usecases/list-observations.js';

export {
  listAnnualStats,
  type ListAnnualStatsDeps,
  type ListAnnualStatsInput,
} from './core/usecases/list-annual-stats.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository & Files
// ─────────────────────────────────────────────────────────────────────────────

export { makeWeatherRepo, type WeatherRepoOptions } from './shell/repo/weather-repo.js';
export { makeFsStationFileSource } from './shell/files/fs-station-files.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST & Commands
// ─────────────────────────────────────────────────────────────────────────────

export { makeWeatherRoutes, type MakeWeatherRoutesDeps } from './shell/rest/routes.js';

export {
  runIngestCommand,
  runAnalyzeCommand,
  summarizeRun,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  type WeatherCommandDeps,
} from './shell/cli/commands.js';
