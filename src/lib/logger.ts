/**
 * Standardized Logger Utility
 *
 * Simple wrapper around Pino logger with helper functions.
 * Logs go to stderr so stdout stays free for reports and JSON output.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** Defaults to NODE_ENV === 'development' */
  pretty?: boolean;
}

/**
 * Create a Pino logger with sensible defaults for the reconciler
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const pretty = options.pretty ?? isDevelopment;

  const base: pino.LoggerOptions = {
    name: options.name ?? 'kepler-reconciler',
    level: options.level ?? process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
    redact: {
      paths: ['token', 'password', 'authorization', '*.token', '*.password', '*.clientKeyData'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (pretty) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(base, pino.destination(2));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
  checkpoint: (label: string, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation - functional approach
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.info(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

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
    },

    checkpoint(label: string, additionalContext: Record<string, unknown> = {}): number {
      const elapsed = Date.now() - startTime;

      logger.debug(
        {
          operation,
          checkpoint: label,
          elapsed_ms: elapsed,
          ...context,
          ...additionalContext,
        },
        `${operation} checkpoint: ${label} at ${elapsed}ms`,
      );

      return elapsed;
    },
  };
}
