/**
 * Byte Stream Tests
 */

import { describe, it, expect } from 'vitest';
import { ByteArraySink, ByteArraySource } from '../streams.js';
import { DEFAULT_SINK_CAPACITY_BYTES } from '../constants.js';
import { ErrorCode, InvalidArgumentError, hasErrorCode } from '../errors.js';
import { packValues } from '../codec.js';

describe('ByteArraySink', () => {
  it('should start empty with the default capacity', () => {
    const sink = new ByteArraySink();
    expect(sink.size).toBe(0);
    expect(sink.capacity).toBe(DEFAULT_SINK_CAPACITY_BYTES);
    expect(sink.toUint8Array()).toEqual(new Uint8Array(0));
  });

  it('should grow past its initial capacity', () => {
    const sink = new ByteArraySink(1);
    sink.writeByte(1);
    sink.writeByte(2);
    sink.writeByte(3);
    expect(sink.size).toBe(3);
    expect(sink.capacity).toBe(4);
    expect(Array.from(sink.toUint8Array())).toEqual([1, 2, 3]);
  });

  it('should keep the low eight bits of each byte', () => {
    const sink = new ByteArraySink();
    sink.writeByte(0x1ff);
    expect(Array.from(sink.toUint8Array())).toEqual([0xff]);
  });

  it('should hand out copies', () => {
    const sink = new ByteArraySink();
    sink.writeByte(7);
    const bytes = sink.toUint8Array();
    bytes[0] = 0;
    expect(Array.from(sink.toUint8Array())).toEqual([7]);
  });

  it('should allocate at least one byte', () => {
    expect(new ByteArraySink(0).capacity).toBe(1);
  });

  it('should reject a capacity that is not a finite byte count', () => {
    expect(() => new ByteArraySink(Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => new ByteArraySink(Number.POSITIVE_INFINITY)).toThrow(InvalidArgumentError);
    expect(() => new ByteArraySink(-1)).toThrow('Invalid sink capacity: -1 (expected a finite byte count >= 0)');
  });

  it('should reject a NaN capacity passed through packValues', () => {
    let caught: unknown;
    try {
      packValues([1, 2], 8, { initialCapacityBytes: Number.NaN });
    } catch (error) {
      caught = error;
    }
    expect(hasErrorCode(caught, ErrorCode.INVALID_ARGUMENT)).toBe(true);
  });

  it('should keep every byte written after growing from the smallest buffer', () => {
    const sink = new ByteArraySink(0.5);
    for (const byte of [1, 2, 3, 4, 5]) {
      sink.writeByte(byte);
    }
    expect(sink.size).toBe(5);
    expect(Array.from(sink.toUint8Array())).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('ByteArraySource', () => {
  it('should read bytes in order and then signal the end', () => {
    const source = new ByteArraySource(new Uint8Array([10, 20]));
    expect(source.remaining).toBe(2);
    expect(source.readByte()).toBe(10);
    expect(source.position).toBe(1);
    expect(source.readByte()).toBe(20);
    expect(source.readByte()).toBeUndefined();
    expect(source.remaining).toBe(0);
  });

  it('should accept a plain number array', () => {
    const source = new ByteArraySource([0xab]);
    expect(source.readByte()).toBe(0xab);
  });
});
