/**
 * Write side of the codec
 *
 * A packer appends each value's low `width` bits to an accumulator,
 * most-significant bit first, so the first value of a group lands in the
 * highest bits of the group's first byte. When the accumulator holds a full
 * group its bytes go to the sink, most significant byte first.
 *
 * finish() zero-pads a trailing partial group and emits only the bytes that
 * hold written bits, so a finished stream of N values is exactly
 * ceil(N * width / 8) bytes long.
 *
 * @module packer
 */

import { BITS_PER_BYTE } from './constants.js';
import { PackerFinishedError, ValueOutOfRangeError } from './errors.js';
import { byteAt, insertBits } from './layout.js';
import { createNoopLogger } from './logging.js';
import type { Logger } from './logging-types.js';
import type { ByteSink } from './streams.js';
import type { BitWidth, CodecOptions, GroupLayout, ValuePolicy } from './types.js';

/**
 * Packs values of a fixed width into a byte sink.
 *
 * Lifecycle is `active → finished`: write() any number of times, then
 * finish() once. write() after finish() throws PackerFinishedError.
 */
export interface BitPacker {
  readonly width: BitWidth;
  /** Values accepted by write() */
  readonly valuesWritten: number;
  /** Bytes handed to the sink */
  readonly bytesWritten: number;
  /** True once finish() has run */
  readonly finished: boolean;

  /**
   * Pack one value. May write to the sink when a group completes.
   */
  write(value: number): void;

  /**
   * Flush a partial group, padded with zero bits, and release the sink.
   * Calling finish() again does nothing.
   */
  finish(): void;
}

abstract class BasePacker implements BitPacker {
  private sink: ByteSink | null;
  private written = 0;
  private emitted = 0;
  private readonly valuePolicy: ValuePolicy;
  protected readonly logger: Logger;

  constructor(
    protected readonly layout: GroupLayout,
    sink: ByteSink,
    options: CodecOptions
  ) {
    this.sink = sink;
    this.valuePolicy = options.valuePolicy ?? 'mask';
    this.logger = options.logger ?? createNoopLogger();
  }

  get width(): BitWidth {
    return this.layout.width;
  }

  get valuesWritten(): number {
    return this.written;
  }

  get bytesWritten(): number {
    return this.emitted;
  }

  get finished(): boolean {
    return this.sink === null;
  }

  write(value: number): void {
    if (this.sink === null) {
      throw new PackerFinishedError(this.layout.width);
    }
    this.pack(this.normalize(value), this.sink);
    this.written++;
  }

  finish(): void {
    if (this.sink === null) {
      return;
    }
    const paddingBits = this.flush(this.sink);
    this.sink = null;
    this.logger.debug('Packer finished', {
      operation: 'finish',
      width: this.layout.width,
      values: this.written,
      bytes: this.emitted,
      paddingBits,
    });
  }

  protected emit(sink: ByteSink, byte: number): void {
    sink.writeByte(byte);
    this.emitted++;
  }

  /**
   * Pack a value already reduced to `width` bits.
   */
  protected abstract pack(value: number, sink: ByteSink): void;

  /**
   * Emit any partial group; returns the number of zero padding bits written.
   */
  protected abstract flush(sink: ByteSink): number;

  private normalize(value: number): number {
    const { maxValue, width } = this.layout;
    if (this.valuePolicy === 'reject') {
      if (!Number.isInteger(value) || value < 0 || value > maxValue) {
        throw new ValueOutOfRangeError(value, width);
      }
      return value;
    }
    return value & maxValue;
  }
}

/**
 * Width 0: values carry no information and nothing is ever written.
 */
export class ZeroWidthPacker extends BasePacker {
  protected pack(): void {}

  protected flush(): number {
    return 0;
  }
}

/**
 * Width 8: one value per byte, passed straight through.
 */
export class BytePacker extends BasePacker {
  protected pack(value: number, sink: ByteSink): void {
    this.emit(sink, value);
  }

  protected flush(): number {
    return 0;
  }
}

/**
 * Widths 1-7: values accumulate until a whole group is byte-aligned.
 */
export class GroupPacker extends BasePacker {
  private accumulator = 0n;
  private count = 0;

  protected pack(value: number, sink: ByteSink): void {
    this.accumulator = insertBits(this.accumulator, value, this.layout.width);
    this.count++;
    if (this.count === this.layout.valuesPerGroup) {
      this.emitGroup(sink, this.layout.bytesPerGroup);
    }
  }

  protected flush(sink: ByteSink): number {
    if (this.count === 0) {
      return 0;
    }
    const { width, valuesPerGroup } = this.layout;
    const usedBits = this.count * width;
    const usedBytes = Math.ceil(usedBits / BITS_PER_BYTE);

    // align the held values to the top of the group; the low bits stay zero
    this.accumulator <<= BigInt((valuesPerGroup - this.count) * width);
    this.emitGroup(sink, usedBytes);
    return usedBytes * BITS_PER_BYTE - usedBits;
  }

  private emitGroup(sink: ByteSink, byteCount: number): void {
    const { bytesPerGroup } = this.layout;
    for (let i = 0; i < byteCount; i++) {
      this.emit(sink, byteAt(this.accumulator, i, bytesPerGroup));
    }
    this.accumulator = 0n;
    this.count = 0;
  }
}
