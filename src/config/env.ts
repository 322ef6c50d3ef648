/**
 * Environment variable overrides for the loader configuration.
 *
 * Override precedence: explicit options > env > defaults
 *
 * @packageDocumentation
 */

import type { LoaderConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Values read from the environment.
 */
export interface EnvOverrides {
  /** A settings file tried before every other candidate. */
  config_path?: string;
  sound_search_path?: string;
  vibration_search_path?: string;
  debug?: boolean;
}

type EnvMapping =
  | {
      readonly type: 'string';
      readonly field: 'config_path' | 'sound_search_path' | 'vibration_search_path';
      readonly description: string;
    }
  | { readonly type: 'boolean'; readonly field: 'debug'; readonly description: string };

/**
 * Mapping from environment variable names to override fields.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  FEEDBACKD_CONFIG: {
    type: 'string',
    field: 'config_path',
    description: 'Settings file to try before the default candidates',
  },
  FEEDBACKD_SOUND_SEARCH_PATH: {
    type: 'string',
    field: 'sound_search_path',
    description: 'Override the sound search directory',
  },
  FEEDBACKD_VIBRATION_SEARCH_PATH: {
    type: 'string',
    field: 'vibration_search_path',
    description: 'Override the vibration search directory',
  },
  FEEDBACKD_DEBUG: {
    type: 'boolean',
    field: 'debug',
    description: 'Enable or disable debug logging (true/false)',
  },
};

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Values taken from environment variables. */
  overrides: EnvOverrides;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads the FEEDBACKD_* environment variables. Unset and empty variables are
 * ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to return coercion errors instead of
 * throwing the first one.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError if a value cannot be coerced and errors are not collected.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ FEEDBACKD_DEBUG: 'yes' });
 * overrides.debug; // true
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: EnvOverrides = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      switch (mapping.type) {
        case 'string':
          overrides[mapping.field] = value;
          break;
        case 'boolean':
          overrides[mapping.field] = coerceToBoolean(value, envVar);
          break;
      }
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a loader configuration.
 *
 * `FEEDBACKD_CONFIG` is moved to the front of the candidate list; the other
 * variables replace their fields.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(
  config: LoaderConfig,
  env: EnvRecord = process.env
): LoaderConfig {
  const { overrides } = readEnvOverrides(env);
  const { config_path: configPath, ...fields } = overrides;

  const candidatePaths =
    configPath === undefined
      ? config.candidate_paths
      : [configPath, ...config.candidate_paths.filter((candidate) => candidate !== configPath)];

  return { ...config, ...fields, candidate_paths: candidatePaths };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
