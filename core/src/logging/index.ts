/**
 * @narrowpack/core/logging - Logging Type Definitions
 *
 * Types only, for code that accepts a logger without creating one.
 * Implementations are exported from the package root.
 *
 * @module logging
 */

export type {
  Logger,
  LogLevel,
  LogEntry,
  LogFormat,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
  LogContext,
  LogContextValue,
} from '../logging-types.js';
