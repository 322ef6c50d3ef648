/**
 * Configuration types for the settings loader.
 *
 * @packageDocumentation
 */

/**
 * Where the loader looks for the settings file and how it reports.
 */
export interface LoaderConfig {
  /** Settings file locations, tried in order. */
  candidate_paths: string[];
  /** Sound directory; replaces `sound_search_path` from the `general` group. */
  sound_search_path?: string | undefined;
  /** Vibration directory; replaces `vibration_search_path` from the `general` group. */
  vibration_search_path?: string | undefined;
  /** Whether debug-level log entries are written. */
  debug: boolean;
}

/**
 * Loader configuration with every field optional, for overrides.
 */
export type PartialLoaderConfig = Partial<LoaderConfig>;
