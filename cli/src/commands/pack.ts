/**
 * @narrowpack/cli Pack Command
 *
 * Packs values given on the command line and/or in a file.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { packValues } from '@narrowpack/core';
import { toCodecOptions } from '@narrowpack/config';

import { encodeBytes, parseValues } from '../encoding.js';
import type { PackOptions, PackResult } from '../types.js';

// Re-export types for external use
export type { PackOptions, PackResult };

/**
 * Pack command: pack values at a fixed width and encode the bytes
 */
export async function packCommand(options: PackOptions): Promise<PackResult> {
  const { width, cwd, format, config, logger } = options;

  try {
    const tokens = [...options.values];

    if (options.input) {
      const inputPath = resolve(cwd, options.input);
      if (!existsSync(inputPath)) {
        return { success: false, count: 0, output: '', byteLength: 0, error: `Input file not found: ${inputPath}` };
      }
      tokens.push(await readFile(inputPath, 'utf8'));
    }

    const values = parseValues(tokens);
    const bytes = packValues(values, width, {
      ...toCodecOptions(config, logger),
      initialCapacityBytes: config.codec.initialSinkCapacityBytes,
    });

    logger?.info('Packed values', {
      operation: 'pack',
      width,
      values: values.length,
      bytes: bytes.length,
    });

    return {
      success: true,
      count: values.length,
      output: encodeBytes(bytes, format),
      byteLength: bytes.length,
    };
  } catch (error) {
    return {
      success: false,
      count: 0,
      output: '',
      byteLength: 0,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
