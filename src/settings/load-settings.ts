/**
 * Loading settings from disk.
 *
 * @packageDocumentation
 */

import { applyEnvOverrides } from '../config/env.js';
import type { EnvRecord } from '../config/env.js';
import { getDefaultLoaderConfig } from '../config/defaults.js';
import type { LoaderConfig, PartialLoaderConfig } from '../config/types.js';
import { assertLoaderConfigValid } from '../config/validator.js';
import type { PathChecker } from '../config/validator.js';
import { loadSource } from '../source/loader.js';
import type { TextFileReader } from '../source/types.js';
import { Logger } from '../utils/logger.js';
import { resolveSettings } from './driver.js';
import type { ResolutionResult } from './driver.js';
import type { PathExists } from './types.js';

/**
 * Options for {@link loadSettings}. Loader configuration fields given here
 * take precedence over the environment.
 */
export interface LoadSettingsOptions extends PartialLoaderConfig {
  /** Environment to read FEEDBACKD_* variables from; defaults to process.env. */
  env?: EnvRecord;
  /** Reads a candidate file. */
  readFile?: TextFileReader;
  /** Existence check for `filename:` references. */
  pathExists?: PathExists;
  /** When given, configured search paths must be existing directories. */
  pathChecker?: PathChecker;
  /** Logger to use instead of one built from the `debug` setting. */
  logger?: Logger;
}

/**
 * Settings loaded from the first usable candidate.
 */
export interface LoadedSettings extends ResolutionResult {
  /** The file the settings came from. */
  readonly path: string;
  /** The effective loader configuration. */
  readonly config: LoaderConfig;
}

/**
 * Builds the loader configuration: defaults, then the environment, then the
 * explicit options.
 */
export function buildLoaderConfig(
  options: PartialLoaderConfig = {},
  env: EnvRecord = process.env
): LoaderConfig {
  const fromEnv = applyEnvOverrides(getDefaultLoaderConfig(), env);
  return {
    candidate_paths: options.candidate_paths ?? fromEnv.candidate_paths,
    sound_search_path: options.sound_search_path ?? fromEnv.sound_search_path,
    vibration_search_path: options.vibration_search_path ?? fromEnv.vibration_search_path,
    debug: options.debug ?? fromEnv.debug,
  };
}

/**
 * Loads and resolves the settings.
 *
 * @param options - Loader configuration overrides and injected dependencies.
 * @returns The resolved settings and the file they came from.
 * @throws EnvCoercionError if an environment variable is malformed.
 * @throws ConfigValidationError if the loader configuration is invalid.
 * @throws SourceLoadError if no candidate could be read and parsed.
 *
 * @example
 * ```typescript
 * const { registry, path } = await loadSettings({ debug: true });
 * registry.getEvent('ringtone');
 * ```
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<LoadedSettings> {
  const { env, readFile, pathExists, pathChecker, logger: givenLogger, ...overrides } = options;

  const config = buildLoaderConfig(overrides, env);
  assertLoaderConfigValid(config, pathChecker !== undefined ? { pathChecker } : {});

  const logger =
    givenLogger ?? new Logger({ component: 'SettingsLoader', debugMode: config.debug });

  const loaded = await loadSource(config.candidate_paths, readFile);
  for (const attempt of loaded.skipped) {
    logger.warn('candidate_skipped', { path: attempt.path, reason: attempt.reason });
  }
  logger.info('source_loaded', { path: loaded.path, debug: logger.isDebugEnabled });

  const result = resolveSettings(loaded.source, {
    soundSearchPath: config.sound_search_path,
    vibrationSearchPath: config.vibration_search_path,
    pathExists,
    logger,
  });

  return { ...result, path: loaded.path, config };
}
