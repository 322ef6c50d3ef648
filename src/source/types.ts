/**
 * Types for the configuration source.
 *
 * @packageDocumentation
 */

/**
 * TOML type of a raw value, as named in type-mismatch diagnostics.
 */
export type TomlValueType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'array'
  | 'table'
  | 'datetime';

/**
 * Outcome of reading one field of one group.
 *
 * - `ok`: the field exists and has the requested type
 * - `type-error`: the field exists with another type
 * - `not-found`: the group or the field does not exist
 */
export type LookupResult<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'type-error'; readonly actual: TomlValueType }
  | { readonly status: 'not-found' };

/**
 * One failed attempt at loading a candidate source.
 */
export interface LoadAttempt {
  /** The candidate path. */
  readonly path: string;
  /** Why it could not be used. */
  readonly reason: string;
}

/**
 * Function used to read a candidate file as text.
 */
export type TextFileReader = (filePath: string) => Promise<string>;
