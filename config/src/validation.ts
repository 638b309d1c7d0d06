/**
 * @narrowpack/config - Configuration Validation
 *
 * Validates configuration values and reports each problem with its path.
 *
 * @packageDocumentation
 */

import {
  MAX_SINK_CAPACITY_BYTES,
  VALUE_POLICIES,
  isLogLevel,
  isValuePolicy,
} from '@narrowpack/core';

import type {
  NarrowPackConfig,
  ValidationResult,
  ValidationError,
  ValidationWarning,
} from './types.js';

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

/**
 * Validate a complete NarrowPackConfig.
 *
 * Configs built from untyped input (JSON, environment) may carry values
 * outside their declared unions; those are reported as errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: NarrowPackConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateCodecConfig(config.codec, errors, warnings);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateCodecConfig(
  codec: NarrowPackConfig['codec'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  const policy: unknown = codec.valuePolicy;
  if (!isValuePolicy(policy)) {
    errors.push({
      path: 'codec.valuePolicy',
      message: `Value policy must be one of: ${VALUE_POLICIES.join(', ')}`,
      value: policy,
    });
  }

  const capacity = codec.initialSinkCapacityBytes;
  if (!Number.isInteger(capacity) || capacity <= 0) {
    errors.push({
      path: 'codec.initialSinkCapacityBytes',
      message: 'Initial sink capacity must be a positive integer',
      value: capacity,
      suggestion: 'Use a byte count such as 64 or 4096',
    });
  } else if (capacity > MAX_SINK_CAPACITY_BYTES) {
    warnings.push({
      path: 'codec.initialSinkCapacityBytes',
      message: `Initial sink capacity exceeds ${MAX_SINK_CAPACITY_BYTES} bytes, allocated up front for every pack`,
      value: capacity,
      recommendation: 'Start small; the buffer grows as bytes are written',
    });
  }
}

function validateObservabilityConfig(
  observability: NarrowPackConfig['observability'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  const level: unknown = observability.logLevel;
  if (!isLogLevel(level)) {
    errors.push({
      path: 'observability.logLevel',
      message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`,
      value: level,
    });
  }

  const validLogFormats: readonly string[] = ['json', 'pretty'];
  if (!validLogFormats.includes(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: observability.logFormat,
    });
  }

  if (observability.logLevel === 'debug') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Debug logging emits one entry per packed or unpacked pass',
      value: observability.logLevel,
      recommendation: 'Use "info" or higher outside of troubleshooting',
    });
  }
}
