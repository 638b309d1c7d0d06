/**
 * Read side of the codec, mirroring the packers
 *
 * An unpacker refills its accumulator one group at a time, concatenating
 * the group's bytes most significant first, then hands out `width`-bit
 * windows from the top down.
 *
 * @module unpacker
 */

import { BITS_PER_BYTE } from './constants.js';
import { InvalidArgumentError, SourceExhaustedError } from './errors.js';
import { extractBits } from './layout.js';
import { createNoopLogger } from './logging.js';
import type { Logger } from './logging-types.js';
import type { ByteSource } from './streams.js';
import type { BitWidth, GroupLayout, UnpackerOptions } from './types.js';

/**
 * Reads values of a fixed width back from a byte source.
 *
 * The value count is not part of the stream. Without a `count` option,
 * read() past the written values returns the zero padding that shares a
 * byte with the last value and then throws SourceExhaustedError; with one,
 * it throws as soon as `count` values were returned.
 */
export interface BitUnpacker {
  readonly width: BitWidth;
  /** Values returned by read() */
  readonly valuesRead: number;
  /** Bytes taken from the source */
  readonly bytesRead: number;

  /**
   * Decode the next value.
   *
   * @throws SourceExhaustedError when the source holds no bits of the next value
   */
  read(): number;
}

abstract class BaseUnpacker implements BitUnpacker {
  private consumed = 0;
  private returned = 0;
  private readonly limit: number | undefined;
  protected readonly logger: Logger;

  constructor(
    protected readonly layout: GroupLayout,
    protected readonly source: ByteSource,
    options: UnpackerOptions
  ) {
    const { count } = options;
    if (count !== undefined && (!Number.isInteger(count) || count < 0)) {
      throw new InvalidArgumentError('value count', count, 'an integer >= 0');
    }
    this.limit = count;
    this.logger = options.logger ?? createNoopLogger();
  }

  get width(): BitWidth {
    return this.layout.width;
  }

  get valuesRead(): number {
    return this.returned;
  }

  get bytesRead(): number {
    return this.consumed;
  }

  read(): number {
    if (this.limit !== undefined && this.returned >= this.limit) {
      throw this.exhausted();
    }
    const value = this.unpack();
    this.returned++;
    return value;
  }

  protected abstract unpack(): number;

  /** Values still to come in a counted pass; undefined when unbounded */
  protected get valuesLeft(): number | undefined {
    return this.limit === undefined ? undefined : this.limit - this.returned;
  }

  protected nextByte(): number | undefined {
    const byte = this.source.readByte();
    if (byte !== undefined) {
      this.consumed++;
    }
    return byte;
  }

  protected exhausted(): SourceExhaustedError {
    return new SourceExhaustedError(this.layout.width, this.returned, this.consumed);
  }
}

/**
 * Width 0: every value is 0 and the source is never touched.
 */
export class ZeroWidthUnpacker extends BaseUnpacker {
  protected unpack(): number {
    return 0;
  }
}

/**
 * Width 8: each value is one source byte.
 */
export class ByteUnpacker extends BaseUnpacker {
  protected unpack(): number {
    const byte = this.nextByte();
    if (byte === undefined) {
      throw this.exhausted();
    }
    return byte;
  }
}

/**
 * Widths 1-7: values are cut from a whole group held in the accumulator.
 *
 * A refill takes one group's bytes, or in a counted pass only the bytes the
 * remaining values occupy. When fewer bytes arrive, the group is the
 * stream's trailing group: a value is returned only if at least its first
 * bit was received (the rest of it is zero padding), and the next value
 * throws SourceExhaustedError.
 */
export class GroupUnpacker extends BaseUnpacker {
  private accumulator = 0n;
  private next = 0;
  private available = 0;
  private drained = false;

  protected unpack(): number {
    if (this.next === this.available) {
      this.refill();
    }
    const { valuesPerGroup, width } = this.layout;
    const value = extractBits(this.accumulator, (valuesPerGroup - 1 - this.next) * width, width);
    this.next++;
    return value;
  }

  private refill(): void {
    if (this.drained) {
      throw this.exhausted();
    }

    const { bytesPerGroup, valuesPerGroup, width } = this.layout;
    const left = this.valuesLeft;
    const wanted =
      left === undefined
        ? bytesPerGroup
        : Math.min(bytesPerGroup, Math.ceil((left * width) / BITS_PER_BYTE));

    let accumulator = 0n;
    let received = 0;
    while (received < wanted) {
      const byte = this.nextByte();
      if (byte === undefined) {
        break;
      }
      accumulator = (accumulator << BigInt(BITS_PER_BYTE)) | BigInt(byte);
      received++;
    }

    if (received === 0) {
      throw this.exhausted();
    }

    if (received < bytesPerGroup) {
      this.drained = true;
      accumulator <<= BigInt((bytesPerGroup - received) * BITS_PER_BYTE);
    }

    if (received < wanted) {
      this.logger.debug('Read short trailing group', {
        operation: 'read',
        width,
        bytes: received,
        expectedBytes: wanted,
      });
    }

    this.accumulator = accumulator;
    this.next = 0;
    this.available = Math.min(valuesPerGroup, Math.ceil((received * BITS_PER_BYTE) / width));
  }
}
