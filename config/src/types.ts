/**
 * @narrowpack/config - Type Definitions
 *
 * Configuration schema shared by the narrowpack packages.
 *
 * Naming Conventions:
 * - All sizes: *Bytes
 *
 * @packageDocumentation
 * @module @narrowpack/config
 */

import type { ValuePolicy } from '@narrowpack/core';
import type { LogFormat, LogLevel } from '@narrowpack/core/logging';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Codec Configuration
// =============================================================================

/**
 * Codec configuration.
 *
 * @example
 * ```typescript
 * const codecConfig: CodecConfig = {
 *   valuePolicy: 'reject',
 *   initialSinkCapacityBytes: 4096,
 * };
 * ```
 */
export interface CodecConfig {
  /** Out-of-range value handling on write */
  valuePolicy: ValuePolicy;

  /** Initial capacity of in-memory output buffers */
  initialSinkCapacityBytes: number;
}

// =============================================================================
// Observability Configuration
// =============================================================================

export interface ObservabilityConfig {
  /** Minimum level emitted by the logger */
  logLevel: LogLevel;

  /** Log line format */
  logFormat: LogFormat;
}

// =============================================================================
// Main Configuration
// =============================================================================

/**
 * Complete narrowpack configuration.
 */
export interface NarrowPackConfig {
  codec: CodecConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ValidationError {
  /** Path to the invalid field (e.g., 'codec.valuePolicy') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ValidationWarning {
  /** Path to the field with potential issue */
  path: string;

  /** Human-readable warning message */
  message: string;

  /** The concerning value */
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

/**
 * Result of configuration validation.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;

  errors: ValidationError[];

  warnings: ValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'NARROWPACK') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
