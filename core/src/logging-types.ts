/**
 * Logging Type Definitions for narrowpack
 *
 * Interfaces for the Logger abstraction. Implementations live in
 * `logging.ts`; code that only accepts a logger imports types from here.
 *
 * ```typescript
 * import type { Logger } from '@narrowpack/core/logging';
 *
 * function drain(logger?: Logger): void {
 *   logger?.debug('Draining column chunk');
 * }
 * ```
 */

/**
 * Log level types
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Allowed value types in log context (JSON-serializable)
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries
 */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Operation being performed */
  operation?: string;
  /** Bit width of the codec instance */
  width?: number;
  /** Values written or read */
  values?: number;
  /** Bytes written or read */
  bytes?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code for error logs */
  errorCode?: string;
  /** Additional custom fields */
  [key: string]: LogContextValue | undefined;
}

/**
 * A single log entry with all metadata
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

/**
 * Logger interface - the core abstraction for logging
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

/**
 * Configuration options for creating a logger
 */
export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Custom output function for log entries */
  output?: (entry: LogEntry) => void;
}

/**
 * Output format of the console logger
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Configuration options for console logger
 */
export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for structured logs, 'pretty' for human-readable (default: 'json') */
  format?: LogFormat;
  /** Line writer (default: console.error, keeping stdout free for data) */
  write?: (line: string) => void;
}

/**
 * Test logger with additional methods for assertions
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}
