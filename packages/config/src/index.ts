export {
  ConfigError,
  requireEnv,
  stringEnv,
  intEnv,
  listEnv,
  zoneEnv,
  loggingEnv,
  type Env,
  type LoggingConfig,
} from './env.js';
export { createLogger } from './logger.js';
