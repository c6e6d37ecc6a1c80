/**
 * Logger factory built on pino.
 *
 * Every module takes a child of the root logger (`createLogger().child({ module })`)
 * so log lines carry the component that produced them.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
}

export interface Timer {
  end(additionalContext?: Record<string, unknown>): void;
  error(error: unknown, additionalContext?: Record<string, unknown>): void;
}

const REDACT_PATHS = ['apiKey', 'apiKeys', 'req.headers["x-api-key"]', 'headers["x-api-key"]'];

function resolveLevel(level?: string): string {
  return (level || process.env.LOG_LEVEL || 'info').toLowerCase();
}

/**
 * Create a pino logger.
 *
 * Level precedence: explicit option, then `LOG_LEVEL`, then `info`.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: resolveLevel(options.level),
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.name) {
    loggerOptions.name = options.name;
  }

  return pino(loggerOptions);
}

/**
 * Measure an operation and log its duration on completion or failure.
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const start = Date.now();

  return {
    end(additionalContext?: Record<string, unknown>): void {
      logger.debug({ operation, durationMs: Date.now() - start, ...additionalContext }, 'Operation completed');
    },

    error(error: unknown, additionalContext?: Record<string, unknown>): void {
      logger.error(
        { operation, durationMs: Date.now() - start, error, ...additionalContext },
        'Operation failed',
      );
    },
  };
}
