/**
 * @narrowpack/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations, and to
 * turn a configuration into the objects the codec takes.
 *
 * @packageDocumentation
 */

import {
  createConsoleLogger,
  isLogLevel,
  isValuePolicy,
  type CodecOptions,
  type Logger,
} from '@narrowpack/core';
import type { LogFormat } from '@narrowpack/core/logging';

import type {
  CodecConfig,
  DeepPartial,
  EnvConfigOptions,
  NarrowPackConfig,
  ObservabilityConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

function mergeCodec(target: CodecConfig, source: DeepPartial<CodecConfig> | undefined): CodecConfig {
  return {
    valuePolicy: source?.valuePolicy ?? target.valuePolicy,
    initialSinkCapacityBytes: source?.initialSinkCapacityBytes ?? target.initialSinkCapacityBytes,
  };
}

function mergeObservability(
  target: ObservabilityConfig,
  source: DeepPartial<ObservabilityConfig> | undefined
): ObservabilityConfig {
  return {
    logLevel: source?.logLevel ?? target.logLevel,
    logFormat: source?.logFormat ?? target.logFormat,
  };
}

function freezeConfig(config: NarrowPackConfig): Readonly<NarrowPackConfig> {
  Object.freeze(config.codec);
  Object.freeze(config.observability);
  return Object.freeze(config);
}

/**
 * Create a complete NarrowPackConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen NarrowPackConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({
 *   codec: { valuePolicy: 'reject' },
 *   observability: { logFormat: 'pretty' },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ observability: { logLevel: 'debug' } }, config2);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<NarrowPackConfig>,
  base: NarrowPackConfig = DEFAULT_CONFIG
): NarrowPackConfig {
  return freezeConfig({
    codec: mergeCodec(base.codec, overrides?.codec),
    observability: mergeObservability(base.observability, overrides?.observability),
  });
}

function mergePartialCodec(
  target: DeepPartial<CodecConfig> | undefined,
  source: DeepPartial<CodecConfig> | undefined
): DeepPartial<CodecConfig> | undefined {
  if (!target && !source) {
    return undefined;
  }
  const valuePolicy = source?.valuePolicy ?? target?.valuePolicy;
  const initialSinkCapacityBytes = source?.initialSinkCapacityBytes ?? target?.initialSinkCapacityBytes;
  return {
    ...(valuePolicy !== undefined && { valuePolicy }),
    ...(initialSinkCapacityBytes !== undefined && { initialSinkCapacityBytes }),
  };
}

function mergePartialObservability(
  target: DeepPartial<ObservabilityConfig> | undefined,
  source: DeepPartial<ObservabilityConfig> | undefined
): DeepPartial<ObservabilityConfig> | undefined {
  if (!target && !source) {
    return undefined;
  }
  const logLevel = source?.logLevel ?? target?.logLevel;
  const logFormat = source?.logFormat ?? target?.logFormat;
  return {
    ...(logLevel !== undefined && { logLevel }),
    ...(logFormat !== undefined && { logFormat }),
  };
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { codec: { valuePolicy: 'reject', initialSinkCapacityBytes: 128 } },
 *   { codec: { initialSinkCapacityBytes: 4096 } }
 * );
 * // merged.codec.valuePolicy === 'reject'
 * // merged.codec.initialSinkCapacityBytes === 4096
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<NarrowPackConfig> | null | undefined>
): DeepPartial<NarrowPackConfig> {
  let result: DeepPartial<NarrowPackConfig> = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }
    const codec = mergePartialCodec(result.codec, config.codec);
    const observability = mergePartialObservability(result.observability, config.observability);
    result = {
      ...(codec && { codec }),
      ...(observability && { observability }),
    };
  }

  return result;
}

/**
 * Parse a numeric environment variable; non-numeric text counts as unset.
 */
function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: NARROWPACK_<SECTION>_<FIELD>
 * - NARROWPACK_CODEC_VALUE_POLICY=reject
 * - NARROWPACK_CODEC_INITIAL_SINK_CAPACITY_BYTES=4096
 * - NARROWPACK_OBSERVABILITY_LOG_LEVEL=debug
 * - NARROWPACK_OBSERVABILITY_LOG_FORMAT=pretty
 *
 * Values that do not parse are ignored and the default applies;
 * validateConfig() checks the range of what does.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_CODEC_VALUE_POLICY: 'reject' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): NarrowPackConfig {
  const prefix = options.prefix ?? 'NARROWPACK';
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});

  const overrides: DeepPartial<NarrowPackConfig> = {};

  // Codec configuration
  const valuePolicy = getEnvVar(env, prefix, 'CODEC', 'VALUE', 'POLICY');
  const initialSinkCapacityBytes = parseEnvNumber(
    getEnvVar(env, prefix, 'CODEC', 'INITIAL', 'SINK', 'CAPACITY', 'BYTES')
  );

  if (isValuePolicy(valuePolicy) || initialSinkCapacityBytes !== undefined) {
    overrides.codec = {
      ...(isValuePolicy(valuePolicy) && { valuePolicy }),
      ...(initialSinkCapacityBytes !== undefined && { initialSinkCapacityBytes }),
    };
  }

  // Observability configuration
  const logLevel = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL')?.toLowerCase();
  const logFormat = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT')?.toLowerCase();

  if (isLogLevel(logLevel) || isLogFormat(logFormat)) {
    overrides.observability = {
      ...(isLogLevel(logLevel) && { logLevel }),
      ...(isLogFormat(logFormat) && { logFormat }),
    };
  }

  return createConfig(overrides);
}

/**
 * Create the console logger described by `config.observability`.
 *
 * @example
 * ```typescript
 * const logger = createLoggerFromConfig(getConfigFromEnv());
 * logger.info('Starting');
 * ```
 */
export function createLoggerFromConfig(
  config: NarrowPackConfig,
  write?: (line: string) => void
): Logger {
  return createConsoleLogger({
    minLevel: config.observability.logLevel,
    format: config.observability.logFormat,
    ...(write && { write }),
  });
}

/**
 * Codec options for getBitPacker()/getBitUnpacker() from `config.codec`.
 */
export function toCodecOptions(config: NarrowPackConfig, logger?: Logger): CodecOptions {
  return {
    valuePolicy: config.codec.valuePolicy,
    ...(logger && { logger }),
  };
}
