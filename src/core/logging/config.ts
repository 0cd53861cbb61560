import { LOG_LEVELS, type LoggerConfig, type LogLevel } from './types.js';

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  destination: 'stderr',
  options: {
    timestamp: true,
    hostname: true,
    pid: true,
  },
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get logger configuration from environment variables
 */
export function getLoggerConfigFromEnv(): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const envLevel = process.env.ROLLOUT_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    config.level = envLevel;
  }

  // Enable pretty printing in development
  if (process.env.NODE_ENV === 'development' || process.env.ROLLOUT_LOG_PRETTY === 'true') {
    config.pretty = true;
  }

  if (process.env.ROLLOUT_LOG_DESTINATION) {
    config.destination = process.env.ROLLOUT_LOG_DESTINATION;
  }

  if (process.env.ROLLOUT_LOG_TIMESTAMP === 'false') {
    config.options = { ...config.options, timestamp: false };
  }

  if (process.env.ROLLOUT_LOG_HOSTNAME === 'false') {
    config.options = { ...config.options, hostname: false };
  }

  if (process.env.ROLLOUT_LOG_PID === 'false') {
    config.options = { ...config.options, pid: false };
  }

  return config;
}

/**
 * Validate logger configuration
 */
export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(`Invalid log level: ${config.level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  if (config.destination !== undefined && config.destination.trim() === '') {
    throw new Error('Log destination must not be empty');
  }
}
