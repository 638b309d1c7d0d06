/**
 * @narrowpack/config - Default Configuration Values
 *
 * Values are sourced from @narrowpack/core constants where applicable.
 *
 * @packageDocumentation
 */

import { DEFAULT_SINK_CAPACITY_BYTES } from '@narrowpack/core';

import type { CodecConfig, NarrowPackConfig, ObservabilityConfig } from './types.js';

const DEFAULT_CODEC_CONFIG: Readonly<CodecConfig> = Object.freeze({
  valuePolicy: 'mask',
  initialSinkCapacityBytes: DEFAULT_SINK_CAPACITY_BYTES,
});

const DEFAULT_OBSERVABILITY_CONFIG: Readonly<ObservabilityConfig> = Object.freeze({
  logLevel: 'warn',
  logFormat: 'json',
});

/**
 * Default configuration.
 *
 * Masking is the default value policy: it keeps the low `width` bits of
 * every value, which is what the packing arithmetic does anyway.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@narrowpack/config';
 *
 * DEFAULT_CONFIG.codec.valuePolicy; // 'mask'
 * const strict = createConfig({ codec: { valuePolicy: 'reject' } });
 * ```
 */
export const DEFAULT_CONFIG: Readonly<NarrowPackConfig> = Object.freeze({
  codec: DEFAULT_CODEC_CONFIG,
  observability: DEFAULT_OBSERVABILITY_CONFIG,
});
