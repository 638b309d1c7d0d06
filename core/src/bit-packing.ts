/**
 * Width-indexed dispatch to a packer or unpacker
 *
 * Every width shares one group algorithm; widths 0 and 8 get dedicated
 * variants because they need no accumulator at all.
 *
 * @example
 * ```typescript
 * import { getBitPacker, getBitUnpacker, ByteArraySink, ByteArraySource } from '@narrowpack/core';
 *
 * const sink = new ByteArraySink();
 * const packer = getBitPacker(3, sink);
 * for (const level of [5, 3, 2, 7, 0, 1, 6, 4]) packer.write(level);
 * packer.finish();
 *
 * const unpacker = getBitUnpacker(3, new ByteArraySource(sink.toUint8Array()));
 * unpacker.read(); // 5
 * ```
 *
 * @module bit-packing
 */

import { getGroupLayout } from './layout.js';
import { BytePacker, GroupPacker, ZeroWidthPacker, type BitPacker } from './packer.js';
import { ByteUnpacker, GroupUnpacker, ZeroWidthUnpacker, type BitUnpacker } from './unpacker.js';
import type { ByteSink, ByteSource } from './streams.js';
import type { CodecOptions, GroupLayout, UnpackerOptions } from './types.js';

/**
 * Which packer/unpacker variant serves a layout.
 */
export type PackingStrategy = 'zero' | 'byte' | 'grouped';

/**
 * Pick the variant for a layout.
 */
export function strategyFor(layout: GroupLayout): PackingStrategy {
  if (layout.width === 0) return 'zero';
  if (layout.width === 8) return 'byte';
  return 'grouped';
}

function assertNever(value: never): never {
  throw new Error(`Unhandled packing strategy: ${String(value)}`);
}

/**
 * Packer for `width`, bound to `sink`.
 *
 * @throws UnsupportedWidthError if `width` is not an integer in [0, 8]
 */
export function getBitPacker(width: number, sink: ByteSink, options: CodecOptions = {}): BitPacker {
  const layout = getGroupLayout(width);
  const strategy = strategyFor(layout);
  switch (strategy) {
    case 'zero':
      return new ZeroWidthPacker(layout, sink, options);
    case 'byte':
      return new BytePacker(layout, sink, options);
    case 'grouped':
      return new GroupPacker(layout, sink, options);
    default:
      return assertNever(strategy);
  }
}

/**
 * Unpacker for `width`, bound to `source`.
 *
 * Pass `count` to read one pass out of a source that holds several.
 *
 * @throws UnsupportedWidthError if `width` is not an integer in [0, 8]
 * @throws InvalidArgumentError if `count` is not an integer >= 0
 */
export function getBitUnpacker(width: number, source: ByteSource, options: UnpackerOptions = {}): BitUnpacker {
  const layout = getGroupLayout(width);
  const strategy = strategyFor(layout);
  switch (strategy) {
    case 'zero':
      return new ZeroWidthUnpacker(layout, source, options);
    case 'byte':
      return new ByteUnpacker(layout, source, options);
    case 'grouped':
      return new GroupUnpacker(layout, source, options);
    default:
      return assertNever(strategy);
  }
}
