/**
 * feedbackd-settings
 *
 * Resolves the feedback daemon's settings file into typed, inheritance-resolved
 * event descriptors.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './settings/index.js';

export {
  ConfigurationSource,
  SourceLoadError,
  SourceParseError,
  TomlFloat,
  describeTomlType,
  loadSource,
} from './source/index.js';
export type {
  LoadAttempt,
  LoadedSource,
  LookupResult,
  TextFileReader,
  TomlValueType,
} from './source/index.js';

export {
  ConfigValidationError,
  DEFAULT_CANDIDATE_PATHS,
  DEFAULT_LOADER_CONFIG,
  EnvCoercionError,
  applyEnvOverrides,
  assertLoaderConfigValid,
  fileSystemPathChecker,
  getDefaultLoaderConfig,
  getEnvVarDocumentation,
  readEnvOverrides,
  validateLoaderConfig,
} from './config/index.js';
export type {
  EnvOverrideResult,
  EnvOverrides,
  EnvRecord,
  LoaderConfig,
  PartialLoaderConfig,
  PathChecker,
  PathCheckResult,
  ValidateLoaderConfigOptions,
  ValidationError,
  ValidationResult,
} from './config/index.js';

export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
