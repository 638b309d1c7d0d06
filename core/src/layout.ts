/**
 * Group layouts and bit-window arithmetic
 *
 * For width w a group holds 8 / gcd(w, 8) values spanning
 * w * valuesPerGroup / 8 bytes:
 *
 * | width | values/group | bytes/group |
 * |-------|--------------|-------------|
 * | 0     | 0            | 0           |
 * | 1     | 8            | 1           |
 * | 2     | 4            | 1           |
 * | 3     | 8            | 3           |
 * | 4     | 2            | 1           |
 * | 5     | 8            | 5           |
 * | 6     | 4            | 3           |
 * | 7     | 8            | 7           |
 * | 8     | 1            | 1           |
 *
 * Accumulators are bigint: the width-7 group is 56 bits, past the range
 * where number bit arithmetic stays exact.
 *
 * @module layout
 */

import { BITS_PER_BYTE } from './constants.js';
import { UnsupportedWidthError } from './errors.js';
import { BIT_WIDTHS, isBitWidth, type BitWidth, type GroupLayout } from './types.js';

function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

function computeLayout(width: BitWidth): GroupLayout {
  const valuesPerGroup = width === 0 ? 0 : BITS_PER_BYTE / gcd(width, BITS_PER_BYTE);
  const groupBits = width * valuesPerGroup;
  return Object.freeze({
    width,
    valuesPerGroup,
    bytesPerGroup: groupBits / BITS_PER_BYTE,
    groupBits,
    maxValue: 2 ** width - 1,
  });
}

const GROUP_LAYOUTS: ReadonlyMap<BitWidth, GroupLayout> = new Map(
  BIT_WIDTHS.map((width): [BitWidth, GroupLayout] => [width, computeLayout(width)])
);

/**
 * Group layout for a width.
 *
 * @throws UnsupportedWidthError if `width` is not an integer in [0, 8]
 */
export function getGroupLayout(width: number): GroupLayout {
  const layout = isBitWidth(width) ? GROUP_LAYOUTS.get(width) : undefined;
  if (layout === undefined) {
    throw UnsupportedWidthError.forWidth(width);
  }
  return layout;
}

/**
 * Narrow a runtime width to BitWidth.
 *
 * @throws UnsupportedWidthError if `width` is not an integer in [0, 8]
 */
export function assertBitWidth(width: number): BitWidth {
  if (!isBitWidth(width)) {
    throw UnsupportedWidthError.forWidth(width);
  }
  return width;
}

/**
 * Bytes occupied by `count` values of `width` bits once the packer is finished.
 */
export function packedByteLength(count: number, width: number): number {
  const bitWidth = assertBitWidth(width);
  return Math.ceil((count * bitWidth) / BITS_PER_BYTE);
}

/**
 * Shift `value` in below the bits already held in `accumulator`.
 * `value` must already fit in `width` bits.
 */
export function insertBits(accumulator: bigint, value: number, width: number): bigint {
  return (accumulator << BigInt(width)) | BigInt(value);
}

/**
 * Read the `width`-bit window that starts `shift` bits above the least
 * significant bit of `accumulator`.
 */
export function extractBits(accumulator: bigint, shift: number, width: number): number {
  const mask = (1n << BigInt(width)) - 1n;
  return Number((accumulator >> BigInt(shift)) & mask);
}

/**
 * Byte `index` (0 = most significant) of an accumulator holding `byteCount` bytes.
 */
export function byteAt(accumulator: bigint, index: number, byteCount: number): number {
  return extractBits(accumulator, (byteCount - 1 - index) * BITS_PER_BYTE, BITS_PER_BYTE);
}
