/**
 * Conversions between command-line text and codec input/output
 */

import { InvalidArgumentError } from 'commander';

import { BYTE_FORMATS, type ByteFormat } from './types.js';

const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/i;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isByteFormat(value: unknown): value is ByteFormat {
  return typeof value === 'string' && BYTE_FORMATS.some((format) => format === value);
}

/**
 * Encode bytes as lowercase hex or standard padded base64.
 */
export function encodeBytes(bytes: Uint8Array, format: ByteFormat): string {
  return Buffer.from(bytes).toString(format);
}

/**
 * Decode hex or base64 text. Whitespace is ignored.
 *
 * @throws Error if the text is not valid in `format`
 */
export function decodeBytes(text: string, format: ByteFormat): Uint8Array {
  const compact = text.replace(/\s+/g, '');
  const pattern = format === 'hex' ? HEX_PATTERN : BASE64_PATTERN;
  if (!pattern.test(compact)) {
    throw new Error(`Invalid ${format} data: "${text}"`);
  }
  return new Uint8Array(Buffer.from(compact, format));
}

/**
 * Split value tokens on commas and whitespace and parse each as a number.
 *
 * @throws Error naming the first token that is not a finite number
 */
export function parseValues(tokens: readonly string[]): number[] {
  const values: number[] = [];
  for (const token of tokens) {
    for (const part of token.split(/[\s,]+/)) {
      if (part === '') continue;
      const value = Number(part);
      if (!Number.isFinite(value)) {
        throw new Error(`Invalid value: "${part}"`);
      }
      values.push(value);
    }
  }
  return values;
}

// Commander option parsers

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseByteFormat(value: string): ByteFormat {
  if (!isByteFormat(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${BYTE_FORMATS.join(', ')}.`);
  }
  return value;
}
