/**
 * Default loader configuration.
 *
 * @packageDocumentation
 */

import type { LoaderConfig } from './types.js';

/**
 * System-wide settings file, then one in the working directory.
 */
export const DEFAULT_CANDIDATE_PATHS: readonly string[] = [
  '/etc/feedbackd/feedbackd.toml',
  './feedbackd.toml',
];

/**
 * Complete default loader configuration.
 */
export const DEFAULT_LOADER_CONFIG: LoaderConfig = {
  candidate_paths: [...DEFAULT_CANDIDATE_PATHS],
  debug: false,
};

/**
 * Returns a fresh copy of the default loader configuration.
 */
export function getDefaultLoaderConfig(): LoaderConfig {
  return { ...DEFAULT_LOADER_CONFIG, candidate_paths: [...DEFAULT_LOADER_CONFIG.candidate_paths] };
}
