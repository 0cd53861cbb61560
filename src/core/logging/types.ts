/**
 * Logger interface providing structured logging capabilities
 */
export interface RolloutLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  debug(msg: string, meta?: Record<string, unknown>): void;

  info(msg: string, meta?: Record<string, unknown>): void;

  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages, serializing the error's name, message and stack
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): RolloutLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

/**
 * Configuration options for the logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false)
   */
  pretty?: boolean;

  /**
   * Output destination: 'stderr' (default), 'stdout', or a file path
   */
  destination?: string;

  options?: {
    timestamp?: boolean;
    hostname?: boolean;
    pid?: boolean;
  };
}

/**
 * Context bound onto child loggers
 */
export interface LoggerContext {
  component?: string;
  resourceId?: string;
  runId?: string;
  environment?: string;
  [key: string]: unknown;
}
