/**
 * @narrowpack/cli Unpack Command
 *
 * Decodes packed bytes back to values. The count is not stored in the
 * packed data, so it must be given.
 */

import { unpackValues } from '@narrowpack/core';
import { toCodecOptions } from '@narrowpack/config';

import { decodeBytes } from '../encoding.js';
import type { UnpackOptions, UnpackResult } from '../types.js';

export type { UnpackOptions, UnpackResult };

/**
 * Unpack command: decode `count` values of `width` bits
 */
export async function unpackCommand(options: UnpackOptions): Promise<UnpackResult> {
  const { width, count, format, config, logger } = options;

  if (!Number.isInteger(count) || count < 0) {
    return { success: false, values: [], error: `Count must be a non-negative integer, got ${count}` };
  }

  try {
    const bytes = decodeBytes(options.data, format);
    const values = unpackValues(bytes, width, count, toCodecOptions(config, logger));

    logger?.info('Unpacked values', {
      operation: 'unpack',
      width,
      values: values.length,
      bytes: bytes.length,
    });

    return { success: true, values };
  } catch (error) {
    return {
      success: false,
      values: [],
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
