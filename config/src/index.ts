/**
 * @narrowpack/config - Configuration for the narrowpack codec and CLI
 *
 * - Deep partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with per-field errors and warnings
 * - Bridges to the core: createLoggerFromConfig() and toCodecOptions()
 *
 * @example
 * ```typescript
 * import { getConfigFromEnv, validateConfig, toCodecOptions } from '@narrowpack/config';
 * import { packValues } from '@narrowpack/core';
 *
 * const config = getConfigFromEnv();
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * const bytes = packValues([1, 2, 3], 2, toCodecOptions(config));
 * ```
 *
 * @packageDocumentation
 * @module @narrowpack/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  DeepPartial,
  CodecConfig,
  ObservabilityConfig,
  NarrowPackConfig,
  ValidationError,
  ValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG } from './defaults.js';

// =============================================================================
// Factory Functions
// =============================================================================

export {
  createConfig,
  mergeConfigs,
  getConfigFromEnv,
  createLoggerFromConfig,
  toCodecOptions,
} from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig } from './validation.js';
