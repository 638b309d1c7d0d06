/**
 * Structured Logging for narrowpack
 *
 * Lightweight, injectable loggers. The codec itself only logs at `debug`
 * (group flushes at finish, short trailing groups), so the default no-op
 * logger costs nothing on the hot path.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext, getBitPacker } from '@narrowpack/core';
 *
 * const logger = withContext(createConsoleLogger({ format: 'pretty' }), { service: 'levels' });
 * const packer = getBitPacker(3, sink, { logger });
 * ```
 */

import type {
  ConsoleLoggerConfig,
  LogContext,
  LogContextValue,
  LogEntry,
  LogLevel,
  Logger,
  LoggerConfig,
  TestLogger,
} from './logging-types.js';

export type {
  ConsoleLoggerConfig,
  LogContext,
  LogContextValue,
  LogEntry,
  LogFormat,
  LogLevel,
  Logger,
  LoggerConfig,
  TestLogger,
} from './logging-types.js';

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Log level constants and utilities
 */
export const LogLevels = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',

  /**
   * Get the numeric order of a log level
   */
  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  /**
   * Check if a level is at least as high as a minimum level
   */
  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },
} as const;

/**
 * Type guard: check if a string names a log level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

/**
 * Type guard to check if a value is JSON-serializable log context data.
 */
export function isLogContextValue(value: unknown): value is LogContextValue {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) {
    return value.every(isLogContextValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isLogContextValue);
  }
  return false;
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Build a Logger whose entries go through `emit` once they pass `minLevel`.
 */
function buildLogger(minLevel: LogLevel, emit: (entry: LogEntry) => void): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };

    if (context !== undefined) {
      entry.context = context;
    }

    if (error !== undefined) {
      entry.error = error;
    }

    emit(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Create a logger with custom configuration
 *
 * @example
 * ```typescript
 * const entries: LogEntry[] = [];
 * const logger = createLogger({ minLevel: 'info', output: (entry) => entries.push(entry) });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const output = config.output ?? ((): void => {});
  return buildLogger(config.minLevel ?? 'debug', output);
}

/**
 * Render a log entry as a single JSON line or a human-readable line.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
  }

  return output;
}

/**
 * Create a logger that writes formatted lines to stderr.
 *
 * stderr keeps stdout free for packed output when used from the CLI.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';
  const write = config.write ?? ((line: string): void => console.error(line));

  return buildLogger(config.minLevel ?? 'debug', (entry) => {
    write(formatLogEntry(entry, format));
  });
}

/**
 * Create a no-op logger that discards all log messages
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a test logger that captures log entries for assertions
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * packValues([1, 0, 1], 1, { logger });
 * expect(logger.getLogsByLevel('debug')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = buildLogger(config.minLevel ?? 'debug', (entry) => {
    logs.push(entry);
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger that adds `context` to every entry.
 * Context given at log time wins over the bound context.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext =>
    localContext === undefined ? context : { ...context, ...localContext };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}
