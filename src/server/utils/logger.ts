import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { getEnv } from '../config/env.js';
import { getLoggingConfig, type LoggingConfig } from '../config/logging.js';

const STDERR_FD = 2;

/**
 * Create logger instance based on configuration.
 *
 * Without an explicit destination, output goes to stderr (through
 * pino-pretty when pretty printing is enabled).
 */
export function createLogger(config: LoggingConfig, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      service: 'fattura-allegati',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (destination) {
    return pino(options, destination);
  }

  if (config.enablePrettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(options, pino.destination({ dest: STDERR_FD, sync: true }));
}

let mainLogger: Logger | undefined;

/**
 * Main logger instance, created on first use from the environment
 */
export function getLogger(): Logger {
  if (!mainLogger) {
    mainLogger = createLogger(getLoggingConfig(getEnv()));
  }
  return mainLogger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: Logger, additionalContext: Record<string, unknown>): Logger {
  return parent.child(additionalContext);
}
