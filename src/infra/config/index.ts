export {
  EnvSchema,
  parseEnv,
  createConfig,
  DEFAULT_DATABASE_URL,
  DEFAULT_WEATHER_DATA_DIR,
  type Env,
  type AppConfig,
} from './env.js';
