/**
 * Process bootstrap shared by the API server and the operator scripts:
 * environment, configuration, logger and database client.
 */

import { createConfig, parseEnv, type AppConfig } from './config/index.js';
import { initDatabase, resolveDialectName, type WeatherDbClient } from './database/client.js';
import { createLogger } from './logger/index.js';

import type { Logger } from 'pino';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  db: WeatherDbClient;
}

/**
 * Builds the runtime from environment variables.
 * Throws when the environment is invalid.
 */
export const createRuntime = (env: NodeJS.ProcessEnv, name: string): Runtime => {
  const config = createConfig(parseEnv(env));

  const logger = createLogger({
    level: config.logger.level,
    name,
    pretty: config.logger.pretty,
  });

  const db = initDatabase(config);
  logger.debug({ dialect: resolveDialectName(config.database.url) }, 'Database client created');

  return { config, logger, db };
};
