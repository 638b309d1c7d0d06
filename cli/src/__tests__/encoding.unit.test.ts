/**
 * @narrowpack/cli Encoding Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';

import {
  decodeBytes,
  encodeBytes,
  isByteFormat,
  parseByteFormat,
  parseInteger,
  parseValues,
} from '../encoding.js';

describe('encodeBytes', () => {
  it('should encode lowercase hex', () => {
    expect(encodeBytes(new Uint8Array([0xad, 0x70, 0x74]), 'hex')).toBe('ad7074');
  });

  it('should encode padded base64', () => {
    expect(encodeBytes(new Uint8Array([0xad, 0x70, 0x74]), 'base64')).toBe('rXB0');
    expect(encodeBytes(new Uint8Array([1]), 'base64')).toBe('AQ==');
  });
});

describe('decodeBytes', () => {
  it('should decode hex in either case', () => {
    expect(Array.from(decodeBytes('AD7074', 'hex'))).toEqual([0xad, 0x70, 0x74]);
  });

  it('should decode base64', () => {
    expect(Array.from(decodeBytes('rXB0', 'base64'))).toEqual([0xad, 0x70, 0x74]);
    expect(Array.from(decodeBytes('AQ==', 'base64'))).toEqual([1]);
  });

  it('should reject an odd number of hex digits', () => {
    expect(() => decodeBytes('abc', 'hex')).toThrow('Invalid hex data: "abc"');
  });

  it('should reject unpadded base64', () => {
    expect(() => decodeBytes('rXB', 'base64')).toThrow('Invalid base64 data: "rXB"');
  });
});

describe('parseValues', () => {
  it('should split on commas and whitespace', () => {
    expect(parseValues(['1, 2', ' 3 ', '', '4\n5'])).toEqual([1, 2, 3, 4, 5]);
  });

  it('should name the first bad token', () => {
    expect(() => parseValues(['1', 'two', 'x'])).toThrow('Invalid value: "two"');
  });
});

describe('option parsers', () => {
  it('should parse integers', () => {
    expect(parseInteger('3')).toBe(3);
    expect(() => parseInteger('3.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('')).toThrow(InvalidArgumentError);
  });

  it('should parse byte formats', () => {
    expect(parseByteFormat('base64')).toBe('base64');
    expect(() => parseByteFormat('binary')).toThrow('Allowed choices are hex, base64.');
  });

  it('should recognise byte formats', () => {
    expect(isByteFormat('hex')).toBe(true);
    expect(isByteFormat('HEX')).toBe(false);
    expect(isByteFormat(undefined)).toBe(false);
  });
});
