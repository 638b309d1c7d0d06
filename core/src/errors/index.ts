/**
 * @narrowpack/core/errors - Error classes
 *
 * Typed exceptions raised by the codec:
 * - NarrowPackError: Base error class
 *   - UnsupportedWidthError: Width outside [0, 8]
 *   - ValueOutOfRangeError: Value does not fit its width ('reject' policy)
 *   - PackerFinishedError: write() after finish()
 *   - SourceExhaustedError: No bytes left for the next group
 *
 * @example
 * ```typescript
 * import { hasErrorCode, ErrorCode } from '@narrowpack/core/errors';
 *
 * try {
 *   unpacker.read();
 * } catch (error) {
 *   if (!hasErrorCode(error, ErrorCode.SOURCE_EXHAUSTED)) throw error;
 * }
 * ```
 *
 * @module errors
 */

export {
  ErrorCode,
  isErrorCode,
  NarrowPackError,
  UnsupportedWidthError,
  ValueOutOfRangeError,
  PackerFinishedError,
  SourceExhaustedError,
  InvalidArgumentError,
  isNarrowPackError,
  hasErrorCode,
} from '../errors.js';

export { captureStackTrace } from '../stack-trace.js';
