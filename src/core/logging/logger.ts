import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { LoggerConfig, LoggerContext, RolloutLogger } from './types.js';

/**
 * Pino-based implementation of RolloutLogger
 */
class PinoLogger implements RolloutLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.error(withError(meta, error), msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.fatal(withError(meta, error), msg);
  }

  child(bindings: Record<string, unknown>): RolloutLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function withError(meta: Record<string, unknown> | undefined, error: Error | undefined) {
  const logData: Record<string, unknown> = { ...meta };
  if (error) {
    logData.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return logData;
}

/**
 * Create a logger with the specified configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): RolloutLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  if (finalConfig.options?.hostname === false || finalConfig.options?.pid === false) {
    pinoOptions.base = finalConfig.options?.pid === false ? {} : { pid: process.pid };
  }

  if (finalConfig.level === 'silent') {
    return new PinoLogger(pino(pinoOptions));
  }

  // stdout is reserved for command output, so logs default to stderr (fd 2)
  let transport: pino.TransportSingleOptions | undefined;
  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stderr') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination === 'stdout' ? 1 : finalConfig.destination,
      },
    };
  }

  const pinoLogger = transport
    ? pino(pinoOptions, pino.transport(transport))
    : pino(pinoOptions, pino.destination(2));

  return new PinoLogger(pinoLogger);
}

/**
 * Create a logger with bound context
 */
export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): RolloutLogger {
  return createLogger(config).child(context);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: RolloutLogger = createLogger();

/**
 * Create a component-specific logger
 */
export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): RolloutLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Create a resource-specific logger
 */
export function getResourceLogger(
  resourceId: string,
  additionalContext?: Record<string, unknown>
): RolloutLogger {
  return logger.child({ resourceId, ...additionalContext });
}

/**
 * Create a logger bound to one deployment run
 */
export function getDeploymentLogger(
  runId: string,
  environment?: string,
  additionalContext?: Record<string, unknown>
): RolloutLogger {
  return logger.child({ runId, environment, ...additionalContext });
}
