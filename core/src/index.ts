// @narrowpack/core
// Minimal-width integer packing for widths 0-8 bits

// =============================================================================
// Codec: selector, packers, unpackers
// =============================================================================

export {
  getBitPacker,
  getBitUnpacker,
  strategyFor,
  type PackingStrategy,
} from './bit-packing.js';

export {
  ZeroWidthPacker,
  BytePacker,
  GroupPacker,
  type BitPacker,
} from './packer.js';

export {
  ZeroWidthUnpacker,
  ByteUnpacker,
  GroupUnpacker,
  type BitUnpacker,
} from './unpacker.js';

export {
  packValues,
  unpackValues,
  type PackValuesOptions,
} from './codec.js';

export {
  getGroupLayout,
  assertBitWidth,
  packedByteLength,
  insertBits,
  extractBits,
  byteAt,
} from './layout.js';

// =============================================================================
// Core Types
// =============================================================================

export {
  BIT_WIDTHS,
  VALUE_POLICIES,
  isBitWidth,
  isValuePolicy,
  type BitWidth,
  type GroupLayout,
  type ValuePolicy,
  type CodecOptions,
  type UnpackerOptions,
} from './types.js';

export {
  BITS_PER_BYTE,
  MIN_BIT_WIDTH,
  MAX_BIT_WIDTH,
  MAX_GROUP_BITS,
  MB,
  DEFAULT_SINK_CAPACITY_BYTES,
  MAX_SINK_CAPACITY_BYTES,
} from './constants.js';

// =============================================================================
// Byte Streams
// =============================================================================

export {
  ByteArraySink,
  ByteArraySource,
  type ByteSink,
  type ByteSource,
} from './streams.js';

// =============================================================================
// Errors
// =============================================================================

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
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  isLogLevel,
  isLogContextValue,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogContextValue,
  type LogFormat,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';
