/**
 * @narrowpack/cli Types
 */

import type { GroupLayout, Logger } from '@narrowpack/core';
import type { NarrowPackConfig } from '@narrowpack/config';

/**
 * Text encoding of packed bytes on the command line
 */
export type ByteFormat = 'hex' | 'base64';

export const BYTE_FORMATS: readonly ByteFormat[] = ['hex', 'base64'];

/**
 * Pack command options
 */
export interface PackOptions {
  width: number;
  /** Value tokens from the command line; each may hold several comma- or space-separated values */
  values: string[];
  /** File of values, read after `values` */
  input?: string;
  cwd: string;
  format: ByteFormat;
  config: NarrowPackConfig;
  logger?: Logger;
}

/**
 * Pack command result
 */
export interface PackResult {
  success: boolean;
  /** Number of values packed */
  count: number;
  /** Packed bytes, encoded in the requested format */
  output: string;
  byteLength: number;
  error?: string;
}

/**
 * Unpack command options
 */
export interface UnpackOptions {
  width: number;
  count: number;
  data: string;
  format: ByteFormat;
  config: NarrowPackConfig;
  logger?: Logger;
}

/**
 * Unpack command result
 */
export interface UnpackResult {
  success: boolean;
  values: number[];
  error?: string;
}

/**
 * Layout command options
 */
export interface LayoutOptions {
  /** Single width to describe (default: all widths) */
  width?: number;
}

/**
 * Layout command result
 */
export interface LayoutResult {
  success: boolean;
  layouts: GroupLayout[];
  error?: string;
}
