/**
 * Loads the configuration source from the first usable candidate path.
 *
 * @packageDocumentation
 */

import { safeReadTextFile } from '../utils/safe-fs.js';
import { ConfigurationSource } from './source.js';
import type { LoadAttempt, TextFileReader } from './types.js';

/**
 * Error thrown when none of the candidate paths yields a source.
 */
export class SourceLoadError extends Error {
  /** Every candidate that was tried, in order, with the reason it failed. */
  public readonly attempts: readonly LoadAttempt[];

  /**
   * Creates a new SourceLoadError.
   *
   * @param attempts - The failed attempts.
   */
  constructor(attempts: readonly LoadAttempt[]) {
    const tried = attempts.map((attempt) => attempt.path).join(', ');
    super(
      attempts.length === 0
        ? 'No configuration source candidates given'
        : `No configuration source could be loaded (tried: ${tried})`
    );
    this.name = 'SourceLoadError';
    this.attempts = attempts;
  }
}

/**
 * A successfully loaded source.
 */
export interface LoadedSource {
  readonly source: ConfigurationSource;
  /** The candidate path the source was read from. */
  readonly path: string;
  /** Candidates tried before this one. */
  readonly skipped: readonly LoadAttempt[];
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return 'code' in error && error.code === 'ENOENT' ? 'file not found' : error.message;
  }
  return String(error);
}

/**
 * Reads and parses each candidate in turn and returns the first one that
 * works. A candidate fails when it cannot be read or is not valid TOML.
 *
 * @param candidates - Paths to try, in order.
 * @param readFile - Reads a candidate as text.
 * @throws SourceLoadError if no candidate could be loaded.
 *
 * @example
 * ```typescript
 * const { source, path } = await loadSource(['/etc/feedbackd/feedbackd.toml', './feedbackd.toml']);
 * ```
 */
export async function loadSource(
  candidates: readonly string[],
  readFile: TextFileReader = safeReadTextFile
): Promise<LoadedSource> {
  const attempts: LoadAttempt[] = [];

  for (const path of candidates) {
    let text: string;
    try {
      text = await readFile(path);
    } catch (error) {
      attempts.push({ path, reason: describeError(error) });
      continue;
    }

    try {
      return { source: ConfigurationSource.parse(text), path, skipped: attempts };
    } catch (error) {
      attempts.push({ path, reason: describeError(error) });
    }
  }

  throw new SourceLoadError(attempts);
}
