/**
 * Weather schema bootstrap
 *
 * Creates the two weather tables when they are missing. Column types and
 * constraints are chosen so the same DDL runs on PostgreSQL and SQLite.
 */

import { sql } from 'kysely';

import { MAX_OBSERVATION_YEAR, MIN_OBSERVATION_YEAR } from '../../common/constants/weather.js';

import type { WeatherDbClient } from './client.js';

export const ensureWeatherSchema = async (db: WeatherDbClient): Promise<void> => {
  await db.schema
    .createTable('weather_records')
    .ifNotExists()
    .addColumn('station_id', 'text', (col) => col.notNull())
    .addColumn('date', 'text', (col) => col.notNull())
    .addColumn('max_temp', 'integer')
    .addColumn('min_temp', 'integer')
    .addColumn('precipitation', 'integer')
    .addPrimaryKeyConstraint('weather_records_pkey', ['station_id', 'date'])
    .addCheckConstraint(
      'weather_records_year_range',
      sql`cast(substr(${sql.ref('date')}, 1, 4) as integer) between ${sql.lit(MIN_OBSERVATION_YEAR)} and ${sql.lit(MAX_OBSERVATION_YEAR)}`
    )
    .execute();

  await db.schema
    .createTable('annual_weather_stats')
    .ifNotExists()
    .addColumn('station_id', 'text', (col) => col.notNull())
    .addColumn('year', 'integer', (col) => col.notNull())
    .addColumn('avg_max_temp', 'double precision')
    .addColumn('avg_min_temp', 'double precision')
    .addColumn('total_precipitation', 'double precision')
    .addPrimaryKeyConstraint('annual_weather_stats_pkey', ['station_id', 'year'])
    .execute();
};
