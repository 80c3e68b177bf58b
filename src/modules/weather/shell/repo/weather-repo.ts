/**
 * Weather Repository Implementation
 *
 * Kysely-based storage gateway for observations and annual statistics.
 * The SQL runs unchanged on PostgreSQL and SQLite.
 */

import { sql, type Kysely } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  createDatabaseError,
  createRecordRejectedError,
  type DatabaseError,
  type StorageError,
} from '../../core/errors.js';
import {
  MISSING_VALUE,
  TENTHS_MM_PER_CM,
  TENTHS_PER_DEGREE,
  type AnnualStat,
  type AnnualStatFilter,
  type InsertOutcome,
  type Observation,
  type ObservationFilter,
  type PageRequest,
  type PageResult,
} from '../../core/types.js';

import type { ObservationWriter, WeatherRepository } from '../../core/ports.js';
import type { WeatherDatabase, WeatherDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Rows per INSERT statement when rewriting the annual statistics table */
const STATS_INSERT_CHUNK_SIZE = 500;

const ROW_SAVEPOINT = sql.raw('observation_row');

/**
 * Error codes of a row refused by a constraint or a bad value:
 * PostgreSQL classes 22 (data exception) and 23 (integrity constraint),
 * SQLite SQLITE_CONSTRAINT and its extended codes.
 */
const REJECTED_ROW_CODE_PATTERN = /^(2[23][0-9A-Z]{3}|SQLITE_CONSTRAINT.*|SQLITE_MISMATCH)$/;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface WeatherRepoOptions {
  db: WeatherDbClient;
  logger: Logger;
}

/**
 * Aggregated numbers come back as strings from PostgreSQL (numeric, bigint)
 * and as numbers from SQLite.
 */
type DbNumeric = string | number | bigint;

interface AggregateRow {
  station_id: string;
  year: DbNumeric;
  max_temp_avg: DbNumeric | null;
  min_temp_avg: DbNumeric | null;
  precipitation_sum: DbNumeric | null;
}

/**
 * Thrown out of a transaction callback so Kysely rolls back.
 */
class BatchAbortedError extends Error {
  constructor() {
    super('Observation batch aborted');
    this.name = 'BatchAbortedError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const readErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

const isRejectedRowError = (error: unknown): boolean => {
  const code = readErrorCode(error);
  return code !== undefined && REJECTED_ROW_CODE_PATTERN.test(code);
};

const toNumber = (value: DbNumeric): number => Number(value);

const toNumberOrNull = (value: DbNumeric | null): number | null =>
  value === null ? null : Number(value);

/** Rounds half away from zero, as SQL ROUND does */
const roundTo2 = (value: number): number => {
  const magnitude = Math.round(Math.abs(value) * 100) / 100;
  return value < 0 && magnitude !== 0 ? -magnitude : magnitude;
};

const scaled = (value: DbNumeric | null, divisor: number): number | null => {
  const numeric = toNumberOrNull(value);
  return numeric === null ? null : roundTo2(numeric / divisor);
};

const offsetOf = (page: PageRequest): number => (page.page - 1) * page.pageSize;

/** Year of an ISO date column, portable across dialects */
const yearOfDate = sql<number>`cast(substr(${sql.ref('date')}, 1, 4) as integer)`;

/** Aggregate over the non-missing values of a column */
const presentValues = (column: 'max_temp' | 'min_temp' | 'precipitation') =>
  sql`case when ${sql.ref(column)} <> ${sql.lit(MISSING_VALUE)} then ${sql.ref(column)} end`;

// ─────────────────────────────────────────────────────────────────────────────
// Observation Writer
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Writes observations on an open transaction. Each insert runs under its
 * own savepoint so a refused row does not poison the transaction.
 */
class KyselyObservationWriter implements ObservationWriter {
  constructor(
    private readonly trx: Kysely<WeatherDatabase>,
    private readonly log: Logger
  ) {}

  async insertObservation(
    observation: Observation
  ): Promise<Result<InsertOutcome, StorageError>> {
    try {
      await sql`savepoint ${ROW_SAVEPOINT}`.execute(this.trx);
    } catch (error) {
      return err(createDatabaseError('Failed to open row savepoint', error));
    }

    try {
      const result = await this.trx
        .insertInto('weather_records')
        .values({
          station_id: observation.stationId,
          date: observation.date,
          max_temp: observation.maxTemp,
          min_temp: observation.minTemp,
          precipitation: observation.precipitation,
        })
        .onConflict((oc) => oc.columns(['station_id', 'date']).doNothing())
        .executeTakeFirst();

      await sql`release savepoint ${ROW_SAVEPOINT}`.execute(this.trx);

      const inserted = result.numInsertedOrUpdatedRows ?? 0n;
      return ok(inserted > 0n ? 'inserted' : 'duplicate');
    } catch (error) {
      if (!isRejectedRowError(error)) {
        this.log.error({ err: error }, 'Failed to insert observation');
        return err(createDatabaseError('Failed to insert observation', error));
      }

      try {
        await sql`rollback to savepoint ${ROW_SAVEPOINT}`.execute(this.trx);
        await sql`release savepoint ${ROW_SAVEPOINT}`.execute(this.trx);
      } catch (rollbackError) {
        return err(createDatabaseError('Failed to roll back row savepoint', rollbackError));
      }

      return err(createRecordRejectedError(observation.stationId, observation.date, error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kysely-based Weather Repository.
 */
class KyselyWeatherRepo implements WeatherRepository {
  private readonly db: WeatherDbClient;
  private readonly log: Logger;

  constructor(options: WeatherRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'WeatherRepo' });
  }

  async withObservationBatch<T, E = DatabaseError>(
    work: (writer: ObservationWriter) => Promise<Result<T, E>>
  ): Promise<Result<T, E | DatabaseError>> {
    const outcome: { failure: { error: E } | null } = { failure: null };

    try {
      const value = await this.db.transaction().execute(async (trx) => {
        const result = await work(new KyselyObservationWriter(trx, this.log));
        if (result.isErr()) {
          outcome.failure = { error: result.error };
          throw new BatchAbortedError();
        }
        return result.value;
      });

      return ok(value);
    } catch (error) {
      if (error instanceof BatchAbortedError && outcome.failure !== null) {
        this.log.debug('Observation batch rolled back');
        return err(outcome.failure.error);
      }

      this.log.error({ err: error }, 'Observation batch failed');
      return err(createDatabaseError('Observation batch failed', error));
    }
  }

  async replaceAnnualStats(rows: readonly AnnualStat[]): Promise<Result<number, DatabaseError>> {
    try {
      await this.db.transaction().execute(async (trx) => {
        await trx.deleteFrom('annual_weather_stats').execute();

        for (let start = 0; start < rows.length; start += STATS_INSERT_CHUNK_SIZE) {
          const chunk = rows.slice(start, start + STATS_INSERT_CHUNK_SIZE);
          await trx
            .insertInto('annual_weather_stats')
            .values(
              chunk.map((row) => ({
                station_id: row.stationId,
                year: row.year,
                avg_max_temp: row.avgMaxTemp,
                avg_min_temp: row.avgMinTemp,
                total_precipitation: row.totalPrecipitation,
              }))
            )
            .execute();
        }
      });

      this.log.debug({ rows: rows.length }, 'Annual statistics replaced');
      return ok(rows.length);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to replace annual statistics');
      return err(createDatabaseError('Failed to replace annual statistics', error));
    }
  }

  async computeAnnualAggregates(): Promise<Result<AnnualStat[], DatabaseError>> {
    try {
      const rows: AggregateRow[] = await this.db
        .selectFrom('weather_records')
        .select([
          'station_id',
          yearOfDate.as('year'),
          sql<DbNumeric | null>`avg(${presentValues('max_temp')})`.as('max_temp_avg'),
          sql<DbNumeric | null>`avg(${presentValues('min_temp')})`.as('min_temp_avg'),
          sql<DbNumeric | null>`sum(${presentValues('precipitation')})`.as('precipitation_sum'),
        ])
        .groupBy(['station_id', yearOfDate])
        .orderBy('station_id')
        .orderBy('year')
        .execute();

      return ok(
        rows.map((row) => ({
          stationId: row.station_id,
          year: toNumber(row.year),
          avgMaxTemp: scaled(row.max_temp_avg, TENTHS_PER_DEGREE),
          avgMinTemp: scaled(row.min_temp_avg, TENTHS_PER_DEGREE),
          totalPrecipitation: scaled(row.precipitation_sum, TENTHS_MM_PER_CM),
        }))
      );
    } catch (error) {
      this.log.error({ err: error }, 'Failed to compute annual aggregates');
      return err(createDatabaseError('Failed to compute annual aggregates', error));
    }
  }

  async countObservations(filter: ObservationFilter): Promise<Result<number, DatabaseError>> {
    try {
      let query = this.db
        .selectFrom('weather_records')
        .select((eb) => eb.fn.countAll().as('count'));

      if (filter.stationId !== undefined) {
        query = query.where('station_id', '=', filter.stationId);
      }
      if (filter.date !== undefined) {
        query = query.where('date', '=', filter.date);
      }

      const row = await query.executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to count observations');
      return err(createDatabaseError('Failed to count observations', error));
    }
  }

  async queryObservations(
    filter: ObservationFilter,
    page: PageRequest
  ): Promise<Result<PageResult<Observation>, DatabaseError>> {
    try {
      let query = this.db
        .selectFrom('weather_records')
        .select([
          'station_id',
          'date',
          'max_temp',
          'min_temp',
          'precipitation',
          sql<DbNumeric>`count(*) over ()`.as('total_count'),
        ]);

      if (filter.stationId !== undefined) {
        query = query.where('station_id', '=', filter.stationId);
      }
      if (filter.date !== undefined) {
        query = query.where('date', '=', filter.date);
      }

      const rows = await query
        .orderBy('station_id')
        .orderBy('date')
        .limit(page.pageSize)
        .offset(offsetOf(page))
        .execute();

      const firstRow = rows[0];
      if (firstRow === undefined) {
        if (page.page === 1) {
          return ok({ rows: [], totalCount: 0 });
        }
        // Past the last page the window count is unavailable
        const countResult = await this.countObservations(filter);
        return countResult.map((totalCount): PageResult<Observation> => ({ rows: [], totalCount }));
      }

      return ok({
        rows: rows.map((row) => ({
          stationId: row.station_id,
          date: row.date,
          maxTemp: row.max_temp,
          minTemp: row.min_temp,
          precipitation: row.precipitation,
        })),
        totalCount: toNumber(firstRow.total_count),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to query observations');
      return err(createDatabaseError('Failed to query observations', error));
    }
  }

  async countAnnualStats(filter: AnnualStatFilter): Promise<Result<number, DatabaseError>> {
    try {
      let query = this.db
        .selectFrom('annual_weather_stats')
        .select((eb) => eb.fn.countAll().as('count'));

      if (filter.stationId !== undefined) {
        query = query.where('station_id', '=', filter.stationId);
      }
      if (filter.year !== undefined) {
        query = query.where('year', '=', filter.year);
      }

      const row = await query.executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to count annual statistics');
      return err(createDatabaseError('Failed to count annual statistics', error));
    }
  }

  async queryAnnualStats(
    filter: AnnualStatFilter,
    page: PageRequest
  ): Promise<Result<PageResult<AnnualStat>, DatabaseError>> {
    try {
      let query = this.db
        .selectFrom('annual_weather_stats')
        .select([
          'station_id',
          'year',
          'avg_max_temp',
          'avg_min_temp',
          'total_precipitation',
          sql<DbNumeric>`count(*) over ()`.as('total_count'),
        ]);

      if (filter.stationId !== undefined) {
        query = query.where('station_id', '=', filter.stationId);
      }
      if (filter.year !== undefined) {
        query = query.where('year', '=', filter.year);
      }

      const rows = await query
        .orderBy('station_id')
        .orderBy('year')
        .limit(page.pageSize)
        .offset(offsetOf(page))
        .execute();

      const firstRow = rows[0];
      if (firstRow === undefined) {
        if (page.page === 1) {
          return ok({ rows: [], totalCount: 0 });
        }
        const countResult = await this.countAnnualStats(filter);
        return countResult.map((totalCount): PageResult<AnnualStat> => ({ rows: [], totalCount }));
      }

      return ok({
        rows: rows.map((row) => ({
          stationId: row.station_id,
          year: row.year,
          avgMaxTemp: toNumberOrNull(row.avg_max_temp),
          avgMinTemp: toNumberOrNull(row.avg_min_temp),
          totalPrecipitation: toNumberOrNull(row.total_precipitation),
        })),
        totalCount: toNumber(firstRow.total_count),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to query annual statistics');
      return err(createDatabaseError('Failed to query annual statistics', error));
    }
  }
}

/**
 * Factory function to create a WeatherRepository.
 */
export const makeWeatherRepo = (options: WeatherRepoOptions): WeatherRepository => {
  return new KyselyWeatherRepo(options);
};
