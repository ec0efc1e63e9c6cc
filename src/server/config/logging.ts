/**
 * Logging Configuration
 *
 * Configuration for structured logging with Pino. All log output is
 * diagnostic and goes to stderr; stdout stays free for usage text.
 */

import type { Env } from './env.js';

export interface LoggingConfig {
  level: string;
  enablePrettyPrint: boolean;
}

/**
 * Get logging configuration from the validated environment
 */
export function getLoggingConfig(env: Env): LoggingConfig {
  const isDevelopment = env.NODE_ENV === 'development';

  return {
    level: isDevelopment && env.LOG_LEVEL === 'info' ? 'debug' : env.LOG_LEVEL,
    enablePrettyPrint: isDevelopment || env.LOG_PRETTY,
  };
}
