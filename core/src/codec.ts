/**
 * Buffer-level entry points
 *
 * Convenience wrappers that run a whole pass over an in-memory buffer:
 * packValues() writes and finishes, unpackValues() reads a known count.
 *
 * @example
 * ```typescript
 * const bytes = packValues([1, 2, 3, 4, 5, 6, 7, 8], 5); // 5 bytes
 * unpackValues(bytes, 5, 8); // [1, 2, 3, 4, 5, 6, 7, 8]
 * ```
 */

import { getBitPacker, getBitUnpacker } from './bit-packing.js';
import { packedByteLength } from './layout.js';
import { ByteArraySink, ByteArraySource } from './streams.js';
import type { CodecOptions } from './types.js';

/**
 * Options for packValues()
 */
export interface PackValuesOptions extends CodecOptions {
  /** Initial capacity of the output buffer (default: exact packed length) */
  initialCapacityBytes?: number;
}

/**
 * Pack `values` at `width` bits each into a new buffer of exactly
 * ceil(count * width / 8) bytes.
 *
 * @throws UnsupportedWidthError if `width` is not an integer in [0, 8]
 * @throws ValueOutOfRangeError for an out-of-range value under the 'reject' policy
 */
export function packValues(
  values: Iterable<number>,
  width: number,
  options: PackValuesOptions = {}
): Uint8Array {
  const list = Array.from(values);
  const capacity = options.initialCapacityBytes ?? packedByteLength(list.length, width);
  const sink = new ByteArraySink(capacity);
  const packer = getBitPacker(width, sink, options);
  for (const value of list) {
    packer.write(value);
  }
  packer.finish();
  return sink.toUint8Array();
}

/**
 * Read `count` values of `width` bits from the start of `bytes`.
 *
 * @throws UnsupportedWidthError if `width` is not an integer in [0, 8]
 * Only the first ceil(count * width / 8) bytes are read.
 *
 * @throws SourceExhaustedError if `bytes` holds fewer than `count` values
 * @throws InvalidArgumentError if `count` is not an integer >= 0
 */
export function unpackValues(
  bytes: Uint8Array,
  width: number,
  count: number,
  options: CodecOptions = {}
): number[] {
  const unpacker = getBitUnpacker(width, new ByteArraySource(bytes), { ...options, count });
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(unpacker.read());
  }
  return values;
}
