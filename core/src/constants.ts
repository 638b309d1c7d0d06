/**
 * narrowpack Common Constants
 *
 * Centralized constants for bit widths and buffer sizing.
 * Other packages import these from @narrowpack/core instead of repeating inline values.
 *
 * @module constants
 */

// =============================================================================
// BIT WIDTH CONSTANTS
// =============================================================================

/** Number of bits in one byte */
export const BITS_PER_BYTE = 8;

/** Narrowest supported width (the degenerate, no-op codec) */
export const MIN_BIT_WIDTH = 0;

/** Widest supported width; wider values need a different codec */
export const MAX_BIT_WIDTH = 8;

/** Widest group in bits (width 7: eight values over seven bytes) */
export const MAX_GROUP_BITS = 56;

// =============================================================================
// BUFFER SIZE CONSTANTS
// =============================================================================

/** 1 Megabyte in bytes */
export const MB = 1024 * 1024;

/** Default initial capacity of an in-memory byte sink */
export const DEFAULT_SINK_CAPACITY_BYTES = 64;

/** Largest initial capacity accepted for an in-memory byte sink (64MB) */
export const MAX_SINK_CAPACITY_BYTES = 64 * MB;
