/**
 * Core types for the narrowpack codec
 *
 * @module types
 */

import type { Logger } from './logging-types.js';

/**
 * Number of bits used to encode each value, fixed per codec instance.
 */
export type BitWidth = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

/** All supported widths, narrowest first */
export const BIT_WIDTHS: readonly BitWidth[] = [0, 1, 2, 3, 4, 5, 6, 7, 8];

/**
 * Type guard: check if a value is a supported bit width.
 *
 * @example
 * ```typescript
 * isBitWidth(3);   // true
 * isBitWidth(9);   // false
 * isBitWidth(2.5); // false
 * ```
 */
export function isBitWidth(value: unknown): value is BitWidth {
  return typeof value === 'number' && BIT_WIDTHS.some(width => width === value);
}

/**
 * Byte-aligned unit of packing for one width.
 *
 * A group is the smallest run of values whose total bit length is a
 * multiple of 8. Values inside a group are laid out most-significant first.
 */
export interface GroupLayout {
  /** Bits per value */
  readonly width: BitWidth;
  /** Values that fill one group (0 for width 0) */
  readonly valuesPerGroup: number;
  /** Bytes one full group spans */
  readonly bytesPerGroup: number;
  /** Total bits in one full group */
  readonly groupBits: number;
  /** Largest value the width can hold (2^width - 1) */
  readonly maxValue: number;
}

/**
 * How a packer treats a value outside [0, 2^width - 1].
 *
 * - `mask`: keep the low `width` bits of the value's 32-bit integer form
 * - `reject`: throw a ValueOutOfRangeError before the value is packed
 */
export type ValuePolicy = 'mask' | 'reject';

/** All value policies */
export const VALUE_POLICIES: readonly ValuePolicy[] = ['mask', 'reject'];

/**
 * Type guard: check if a string names a value policy.
 */
export function isValuePolicy(value: unknown): value is ValuePolicy {
  return typeof value === 'string' && VALUE_POLICIES.some(policy => policy === value);
}

/**
 * Options shared by packers and unpackers.
 */
export interface CodecOptions {
  /** Out-of-range handling on write (default: 'mask') */
  valuePolicy?: ValuePolicy;
  /** Logger for lifecycle events (default: no-op) */
  logger?: Logger;
}

/**
 * Options for getBitUnpacker().
 */
export interface UnpackerOptions extends CodecOptions {
  /**
   * Number of values in the pass. When set, the unpacker takes only the
   * ceil(count * width / 8) bytes the packer wrote for them, so a source
   * shared by several passes is left at the start of the next one, and
   * read() throws SourceExhaustedError once `count` values were returned.
   */
  count?: number;
}
