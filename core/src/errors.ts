/**
 * Typed exception classes for narrowpack
 *
 * Error hierarchy:
 * - NarrowPackError: Base error class for all narrowpack errors
 *   - UnsupportedWidthError: Width outside [0, 8] requested from the selector
 *   - ValueOutOfRangeError: Value does not fit the width (reject policy only)
 *   - PackerFinishedError: Write on a packer that was already finished
 *   - SourceExhaustedError: Byte source ended before the next value
 *   - InvalidArgumentError: Bad sink capacity or unpacker value count
 *
 * Errors raised by a ByteSink or ByteSource are not wrapped; they propagate
 * unchanged and abort the pass.
 *
 * @example
 * ```typescript
 * import { unpackValues, NarrowPackError, ErrorCode } from '@narrowpack/core';
 *
 * try {
 *   unpackValues(bytes, 3, 16);
 * } catch (error) {
 *   if (error instanceof NarrowPackError && error.code === ErrorCode.SOURCE_EXHAUSTED) {
 *     logger.warn('Column chunk is shorter than its value count', error.toLogContext());
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';
import { MAX_BIT_WIDTH, MIN_BIT_WIDTH } from './constants.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // Selector errors
  UNSUPPORTED_WIDTH = 'UNSUPPORTED_WIDTH',

  // Packer errors
  VALUE_OUT_OF_RANGE = 'VALUE_OUT_OF_RANGE',
  PACKER_FINISHED = 'PACKER_FINISHED',

  // Unpacker errors
  SOURCE_EXHAUSTED = 'SOURCE_EXHAUSTED',
}

const ERROR_CODES: readonly string[] = Object.values(ErrorCode);

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all narrowpack errors
 *
 * Carries a `code` for programmatic identification, optional structured
 * `details`, and an optional `suggestion` for resolving the condition.
 */
export class NarrowPackError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (operation, width, value, etc.)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic identification (use ErrorCode enum)
   * @param details - Optional structured details for debugging
   * @param suggestion - Optional helpful suggestion for resolving the error
   */
  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'NarrowPackError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, NarrowPackError);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

/**
 * Error thrown for a numeric argument outside its accepted range, such as
 * a non-finite sink capacity or a negative value count.
 */
export class InvalidArgumentError extends NarrowPackError {
  public readonly argument: string;

  constructor(argument: string, value: number, expected: string) {
    super(`Invalid ${argument}: ${value} (expected ${expected})`, ErrorCode.INVALID_ARGUMENT, {
      argument,
      value,
    });
    this.name = 'InvalidArgumentError';
    this.argument = argument;
    captureStackTrace(this, InvalidArgumentError);
  }
}

// =============================================================================
// Selector Errors
// =============================================================================

/**
 * Error thrown when a packer or unpacker is requested for a width outside
 * [0, 8]. Raised before any instance is constructed.
 *
 * @example
 * ```typescript
 * throw UnsupportedWidthError.forWidth(12);
 * ```
 */
export class UnsupportedWidthError extends NarrowPackError {
  /** The width that was requested */
  public readonly width: number;

  constructor(width: number, message?: string) {
    super(
      message ?? `Unsupported bit width: ${width} (supported: ${MIN_BIT_WIDTH}-${MAX_BIT_WIDTH})`,
      ErrorCode.UNSUPPORTED_WIDTH,
      { width, min: MIN_BIT_WIDTH, max: MAX_BIT_WIDTH },
      `Only integer widths ${MIN_BIT_WIDTH} to ${MAX_BIT_WIDTH} are packed here; split wider values across several byte-level codecs`
    );
    this.name = 'UnsupportedWidthError';
    this.width = width;
    captureStackTrace(this, UnsupportedWidthError);
  }

  static forWidth(width: number): UnsupportedWidthError {
    return new UnsupportedWidthError(width);
  }
}

// =============================================================================
// Packer Errors
// =============================================================================

/**
 * Error thrown by a packer with the `reject` value policy when a value is
 * not an integer in [0, 2^width - 1].
 */
export class ValueOutOfRangeError extends NarrowPackError {
  public readonly value: number;
  public readonly width: number;

  constructor(value: number, width: number) {
    const maxValue = 2 ** width - 1;
    super(
      `Value ${value} does not fit in ${width} bit(s) (range 0-${maxValue})`,
      ErrorCode.VALUE_OUT_OF_RANGE,
      { value, width, maxValue },
      `Use a wider bit width or the 'mask' value policy to keep the low ${width} bit(s)`
    );
    this.name = 'ValueOutOfRangeError';
    this.value = value;
    this.width = width;
    captureStackTrace(this, ValueOutOfRangeError);
  }
}

/**
 * Error thrown when write() is called after finish().
 */
export class PackerFinishedError extends NarrowPackError {
  constructor(width: number) {
    super(
      `Cannot write to a ${width}-bit packer after finish()`,
      ErrorCode.PACKER_FINISHED,
      { operation: 'write', width },
      'Create a new packer for each pass over a sink'
    );
    this.name = 'PackerFinishedError';
    captureStackTrace(this, PackerFinishedError);
  }
}

// =============================================================================
// Unpacker Errors
// =============================================================================

/**
 * Error thrown when the byte source holds no bits for the next value, or
 * when an unpacker bounded by a value count has returned all of them.
 *
 * Distinct from I/O failures, which propagate as thrown by the source.
 */
export class SourceExhaustedError extends NarrowPackError {
  constructor(width: number, valuesRead: number, bytesRead: number) {
    super(
      `Byte source exhausted after ${valuesRead} value(s) (${bytesRead} byte(s)) at width ${width}`,
      ErrorCode.SOURCE_EXHAUSTED,
      { operation: 'read', width, valuesRead, bytesRead },
      'Read no more values than were written; the value count is not stored in the stream'
    );
    this.name = 'SourceExhaustedError';
    captureStackTrace(this, SourceExhaustedError);
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Type guard for errors raised by this library.
 */
export function isNarrowPackError(error: unknown): error is NarrowPackError {
  return error instanceof NarrowPackError;
}

/**
 * Check whether an unknown thrown value is a narrowpack error with `code`.
 *
 * @example
 * ```typescript
 * if (hasErrorCode(error, ErrorCode.SOURCE_EXHAUSTED)) {
 *   // stop reading
 * }
 * ```
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isNarrowPackError(error) && error.code === code;
}
