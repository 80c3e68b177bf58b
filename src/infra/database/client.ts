import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';
import pg from 'pg';

import type { WeatherDatabase } from './weather/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type WeatherDbClient = Kysely<WeatherDatabase>;

export type DatabaseDialectName = 'postgres' | 'sqlite';

const POSTGRES_URL_PATTERN = /^postgres(ql)?:\/\//i;

/** In-memory SQLite database, used by tests and throwaway runs */
export const SQLITE_MEMORY = ':memory:';

/**
 * Picks the dialect from the shape of the connection string.
 * PostgreSQL URLs go to a pg pool; anything else is a SQLite file path.
 */
export const resolveDialectName = (databaseUrl: string): DatabaseDialectName =>
  POSTGRES_URL_PATTERN.test(databaseUrl) ? 'postgres' : 'sqlite';

const createPostgresClient = (connectionString: string): WeatherDbClient => {
  return new Kysely<WeatherDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

const createSqliteClient = (filename: string): WeatherDbClient => {
  if (filename !== SQLITE_MEMORY) {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  return new Kysely<WeatherDatabase>({
    dialect: new SqliteDialect({
      database: new Database(filename),
    }),
  });
};

/**
 * Create a Kysely instance for a database URL
 */
export const createWeatherDbClient = (databaseUrl: string): WeatherDbClient => {
  return resolveDialectName(databaseUrl) === 'postgres'
    ? createPostgresClient(databaseUrl)
    : createSqliteClient(databaseUrl);
};

/**
 * Initialize the weather database client from configuration
 */
export const initDatabase = (config: AppConfig): WeatherDbClient => {
  const { url } = config.database;

  if (url === '') {
    throw new Error('Missing configuration for the weather database (DATABASE_URL)');
  }

  return createWeatherDbClient(url);
};

export type { WeatherDatabase, WeatherRecords, AnnualWeatherStats } from './weather/types.js';
