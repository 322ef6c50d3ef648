/**
 * Loader configuration: defaults, environment overrides and validation.
 *
 * Override precedence: explicit options > env > defaults
 *
 * @packageDocumentation
 */

export type { LoaderConfig, PartialLoaderConfig } from './types.js';
export { DEFAULT_CANDIDATE_PATHS, DEFAULT_LOADER_CONFIG, getDefaultLoaderConfig } from './defaults.js';
export {
  ConfigValidationError,
  assertLoaderConfigValid,
  fileSystemPathChecker,
  validateLoaderConfig,
} from './validator.js';
export type {
  PathChecker,
  PathCheckResult,
  ValidationError,
  ValidationResult,
  ValidateLoaderConfigOptions,
} from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvOverrides, EnvRecord } from './env.js';
