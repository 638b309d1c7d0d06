/**
 * Byte stream collaborators for the packing codec
 *
 * Packers write to a ByteSink one byte at a time; unpackers read from a
 * ByteSource one byte at a time. Both are consumed strictly sequentially.
 * Any error a sink or source throws propagates to the caller unchanged.
 *
 * @module streams
 */

import { DEFAULT_SINK_CAPACITY_BYTES } from './constants.js';
import { InvalidArgumentError } from './errors.js';

/**
 * Sequential byte output.
 */
export interface ByteSink {
  /**
   * Append one byte (0-255).
   */
  writeByte(byte: number): void;
}

/**
 * Sequential byte input.
 */
export interface ByteSource {
  /**
   * Read the next byte (0-255), or `undefined` once the data has ended.
   */
  readByte(): number | undefined;
}

/**
 * Growable in-memory ByteSink.
 *
 * @example
 * ```typescript
 * const sink = new ByteArraySink();
 * const packer = getBitPacker(4, sink);
 * packer.write(0xA);
 * packer.write(0x5);
 * sink.toUint8Array(); // Uint8Array [0xA5]
 * ```
 */
export class ByteArraySink implements ByteSink {
  private buffer: Uint8Array;
  private length = 0;

  /**
   * @throws InvalidArgumentError if `initialCapacity` is negative or not finite
   */
  constructor(initialCapacity: number = DEFAULT_SINK_CAPACITY_BYTES) {
    if (!Number.isFinite(initialCapacity) || initialCapacity < 0) {
      throw new InvalidArgumentError('sink capacity', initialCapacity, 'a finite byte count >= 0');
    }
    this.buffer = new Uint8Array(Math.max(1, Math.floor(initialCapacity)));
  }

  /** Number of bytes written so far */
  get size(): number {
    return this.length;
  }

  /** Bytes currently allocated */
  get capacity(): number {
    return this.buffer.length;
  }

  writeByte(byte: number): void {
    if (this.length === this.buffer.length) {
      const grown = new Uint8Array(Math.max(1, this.buffer.length * 2));
      grown.set(this.buffer);
      this.buffer = grown;
    }
    this.buffer[this.length++] = byte & 0xff;
  }

  /**
   * Copy of the bytes written so far.
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}

/**
 * ByteSource over a fixed Uint8Array.
 */
export class ByteArraySource implements ByteSource {
  private readonly bytes: Uint8Array;
  private offset = 0;

  constructor(bytes: Uint8Array | readonly number[]) {
    this.bytes = bytes instanceof Uint8Array ? bytes : Uint8Array.from(bytes);
  }

  /** Index of the next byte to read */
  get position(): number {
    return this.offset;
  }

  /** Bytes left to read */
  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readByte(): number | undefined {
    if (this.offset >= this.bytes.length) {
      return undefined;
    }
    return this.bytes[this.offset++];
  }
}
