/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with the pipeline's defaults. Stage code takes a
 * `Logger` and never builds its own.
 */

import pino from 'pino';
import { errorMessage } from '../domain/types/result';

export type { Logger } from 'pino';

export interface CreateLoggerOptions extends pino.LoggerOptions {
  /** Force debug level (the pipeline's debug/verbose toggle) */
  debug?: boolean;
}

const REDACTED_PATHS = [
  'password',
  'token',
  'secret',
  'authorization',
  'credentials',
  '*.password',
  '*.token',
  '*.secret',
  'registry.password',
];

/**
 * Create a Pino logger with the pipeline's defaults
 */
export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { debug = false, ...pinoOptions } = options;
  const isDevelopment = process.env.NODE_ENV === 'development';

  const level = debug ? 'debug' : (process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'));

  const base: pino.LoggerOptions = {
    name: 'image-release-pipeline',
    level,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    ...pinoOptions,
  };

  if (isDevelopment) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(base);
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation
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
          error: errorMessage(error, String(error)),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
