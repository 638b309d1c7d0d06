/**
 * Packer Tests
 *
 * Byte layout of each packer variant, trailing-group padding,
 * the finished state, value policies and sink failures.
 */

import { describe, it, expect } from 'vitest';
import { getBitPacker } from '../bit-packing.js';
import { ByteArraySink, type ByteSink } from '../streams.js';
import { ErrorCode, PackerFinishedError, ValueOutOfRangeError, hasErrorCode } from '../errors.js';
import { createTestLogger } from '../logging.js';

function pack(values: number[], width: number): number[] {
  const sink = new ByteArraySink();
  const packer = getBitPacker(width, sink);
  for (const value of values) {
    packer.write(value);
  }
  packer.finish();
  return Array.from(sink.toUint8Array());
}

function catchError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('BitPacker', () => {
  describe('full groups', () => {
    it('should pack eight 3-bit values into three bytes, first value highest', () => {
      // 101 011 010 111 000 001 110 100
      expect(pack([5, 3, 2, 7, 0, 1, 6, 4], 3)).toEqual([0xad, 0x70, 0x74]);
    });

    it('should pack eight 5-bit values into exactly five bytes', () => {
      expect(pack([1, 2, 3, 4, 5, 6, 7, 8], 5)).toEqual([0x08, 0x86, 0x42, 0x98, 0xe8]);
    });

    it('should pack eight 1-bit values into one byte', () => {
      expect(pack([1, 0, 1, 1, 0, 0, 1, 0], 1)).toEqual([0xb2]);
    });

    it('should pack four 2-bit values into one byte', () => {
      expect(pack([3, 0, 1, 2], 2)).toEqual([0xc6]);
    });

    it('should pack two 4-bit values into one byte', () => {
      expect(pack([0xa, 0x5], 4)).toEqual([0xa5]);
    });

    it('should pack eight 7-bit values into seven bytes', () => {
      expect(pack([127, 0, 85, 42, 1, 2, 3, 100], 7)).toEqual([
        0xfe, 0x02, 0xaa, 0xa0, 0x20, 0x81, 0xe4,
      ]);
    });

    it('should hold bytes back until a group completes', () => {
      const sink = new ByteArraySink();
      const packer = getBitPacker(3, sink);
      for (const value of [5, 3, 2, 7, 0, 1, 6]) {
        packer.write(value);
      }
      expect(sink.size).toBe(0);
      expect(packer.bytesWritten).toBe(0);

      packer.write(4);
      expect(sink.size).toBe(3);
      expect(packer.bytesWritten).toBe(3);
      expect(packer.valuesWritten).toBe(8);
    });
  });

  describe('finish', () => {
    it('should zero-pad a partial 3-bit group to the next byte boundary', () => {
      expect(pack([7], 3)).toEqual([0xe0]);
    });

    it('should emit only the bytes holding written bits', () => {
      expect(pack([63, 1, 2], 6)).toEqual([0xfc, 0x10, 0x80]);
      expect(pack([31, 31, 31], 5)).toEqual([0xff, 0xfe]);
      expect(pack([1], 7)).toEqual([0x02]);
      expect(pack([1, 2, 3], 2)).toEqual([0x6c]);
    });

    it('should append the partial group after full groups', () => {
      expect(pack([5, 3, 2, 7, 0, 1, 6, 4, 7], 3)).toEqual([0xad, 0x70, 0x74, 0xe0]);
    });

    it('should add nothing when the last group is already complete', () => {
      const sink = new ByteArraySink();
      const packer = getBitPacker(5, sink);
      for (const value of [1, 2, 3, 4, 5, 6, 7, 8]) {
        packer.write(value);
      }
      packer.finish();
      expect(sink.size).toBe(5);
    });

    it('should write nothing for an empty pass', () => {
      expect(pack([], 3)).toEqual([]);
    });

    it('should enter the finished state', () => {
      const packer = getBitPacker(4, new ByteArraySink());
      expect(packer.finished).toBe(false);
      packer.finish();
      expect(packer.finished).toBe(true);
    });

    it('should reject write() after finish()', () => {
      const packer = getBitPacker(4, new ByteArraySink());
      packer.write(1);
      packer.finish();

      const error = catchError(() => packer.write(2));
      expect(error).toBeInstanceOf(PackerFinishedError);
      expect(hasErrorCode(error, ErrorCode.PACKER_FINISHED)).toBe(true);
    });

    it('should treat a second finish() as a no-op', () => {
      const sink = new ByteArraySink();
      const packer = getBitPacker(3, sink);
      packer.write(7);
      packer.finish();
      packer.finish();
      expect(Array.from(sink.toUint8Array())).toEqual([0xe0]);
    });

    it('should log the finished pass at debug level', () => {
      const logger = createTestLogger();
      const packer = getBitPacker(3, new ByteArraySink(), { logger });
      packer.write(7);
      packer.finish();

      const logs = logger.getLogsByLevel('debug');
      expect(logs).toHaveLength(1);
      expect(logs[0].message).toBe('Packer finished');
      expect(logs[0].context).toEqual({
        operation: 'finish',
        width: 3,
        values: 1,
        bytes: 1,
        paddingBits: 5,
      });
    });
  });

  describe('width 0', () => {
    it('should write nothing, before or after finish', () => {
      const sink = new ByteArraySink();
      const packer = getBitPacker(0, sink);
      for (let i = 0; i < 100; i++) {
        packer.write(0);
      }
      expect(sink.size).toBe(0);
      packer.finish();
      expect(sink.size).toBe(0);
      expect(packer.valuesWritten).toBe(100);
    });
  });

  describe('width 8', () => {
    it('should pass each byte straight through', () => {
      const sink = new ByteArraySink();
      const packer = getBitPacker(8, sink);
      packer.write(0);
      expect(sink.size).toBe(1);
      packer.write(127);
      packer.write(255);
      packer.finish();
      expect(Array.from(sink.toUint8Array())).toEqual([0, 127, 255]);
    });
  });

  describe('value policy', () => {
    it('should keep the low bits of out-of-range values by default', () => {
      // 9 -> 001, -1 -> 111
      expect(pack([9, -1], 3)).toEqual([0x3c]);
    });

    it('should mask a non-integer to its integer part', () => {
      expect(pack([2.9, 0], 4)).toEqual([0x20]);
    });

    it('should reject out-of-range values under the reject policy', () => {
      const sink = new ByteArraySink();
      const packer = getBitPacker(3, sink, { valuePolicy: 'reject' });

      expect(() => packer.write(8)).toThrow(ValueOutOfRangeError);
      expect(() => packer.write(-1)).toThrow(ValueOutOfRangeError);
      expect(() => packer.write(1.5)).toThrow(ValueOutOfRangeError);
      expect(packer.valuesWritten).toBe(0);
    });

    it('should accept the full range under the reject policy', () => {
      const sink = new ByteArraySink();
      const packer = getBitPacker(2, sink, { valuePolicy: 'reject' });
      for (const value of [3, 0, 1, 2]) {
        packer.write(value);
      }
      expect(Array.from(sink.toUint8Array())).toEqual([0xc6]);
    });

    it('should only accept 0 at width 0 under the reject policy', () => {
      const packer = getBitPacker(0, new ByteArraySink(), { valuePolicy: 'reject' });
      packer.write(0);
      expect(() => packer.write(1)).toThrow(ValueOutOfRangeError);
    });

    it('should describe the rejected value', () => {
      const error = new ValueOutOfRangeError(300, 8);
      expect(error.message).toBe('Value 300 does not fit in 8 bit(s) (range 0-255)');
      expect(error.details).toEqual({ value: 300, width: 8, maxValue: 255 });
    });
  });

  describe('sink failures', () => {
    it('should propagate the sink error unchanged', () => {
      const failure = new Error('disk full');
      const sink: ByteSink = {
        writeByte(): void {
          throw failure;
        },
      };
      const packer = getBitPacker(1, sink);
      for (let i = 0; i < 7; i++) {
        packer.write(1);
      }
      expect(() => packer.write(1)).toThrow(failure);
    });

    it('should propagate a sink error raised during finish()', () => {
      const sink: ByteSink = {
        writeByte(): void {
          throw new Error('closed');
        },
      };
      const packer = getBitPacker(6, sink);
      packer.write(1);
      expect(() => packer.finish()).toThrow('closed');
    });
  });
});
