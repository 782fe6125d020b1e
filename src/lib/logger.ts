/**
 * Standardized Logger Utility
 *
 * Thin helpers around Pino. Logs go to stderr so stdout only carries the
 * deployment report.
 */

import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Values that must never reach a log line
 */
export const REDACTED_PATHS = [
  'secrets.databaseUrl',
  'secrets.redisUrl',
  'registryAuth.password',
  '*.secrets.databaseUrl',
  '*.secrets.redisUrl',
  '*.registryAuth.password',
  'spec.data',
  'spec.credentials.password',
];

/**
 * Create a Pino logger with the deployer's defaults
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino(
    {
      name: 'dashboard-deployer',
      level: process.env.LOG_LEVEL ?? 'info',
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
      ...options,
    },
    pino.destination(2),
  );
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
  now: () => number = Date.now,
): Timer {
  const startTime = now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = now() - startTime;

      logger.info(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },
  };
}
