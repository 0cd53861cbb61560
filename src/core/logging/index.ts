export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getDeploymentLogger,
  getResourceLogger,
  logger,
} from './logger.js';
export { LOG_LEVELS } from './types.js';
export type { LoggerConfig, LoggerContext, LogLevel, RolloutLogger } from './types.js';
