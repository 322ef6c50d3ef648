/**
 * Parsers for the resource reference mini-language.
 *
 * A reference field holds one or more `;`-separated entries, each a prefix
 * and a payload:
 *
 * | field     | prefixes                                   |
 * |-----------|--------------------------------------------|
 * | sound     | `profile:<key>@<profile>`, `filename:<path>` |
 * | volume    | `profile:<key>@<profile>`, `fixed:<n>`, `linear:<a>;<b>;<c>` |
 * | vibration | `profile:<key>@<profile>`, `filename:<path>`, `internal:<n>` |
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { ReferenceFailureReason, ReferenceField } from './diagnostics.js';
import type {
  PathExists,
  ProfileReference,
  SoundReference,
  VibrationReference,
  VolumeReference,
} from './types.js';

const ENTRY_SEPARATOR = ';';
const LINEAR_PREFIX = 'linear:';
const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Outcome of parsing one reference entry.
 */
export type ReferenceParseResult<T> =
  | { readonly ok: true; readonly reference: T }
  | ReferenceParseFailure;

/**
 * A failed entry and the reason it failed.
 */
export interface ReferenceParseFailure {
  readonly ok: false;
  readonly reason: ReferenceFailureReason;
}

/**
 * Search directories and the existence check used by `filename:` entries.
 */
export interface ReferencePathContext {
  readonly soundSearchPath?: string | undefined;
  readonly vibrationSearchPath?: string | undefined;
  readonly pathExists: PathExists;
}

function success<T>(reference: T): ReferenceParseResult<T> {
  return { ok: true, reference };
}

function failure(reason: ReferenceFailureReason): ReferenceParseFailure {
  return { ok: false, reason };
}

function stripPrefix(entry: string, prefix: string): string | undefined {
  return entry.startsWith(prefix) ? entry.slice(prefix.length) : undefined;
}

/**
 * Parses a decimal integer with an optional leading minus sign.
 */
export function parseInteger(text: string): number | undefined {
  if (!INTEGER_PATTERN.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Splits a `profile:` payload `<key>@<profile>` once on `@`. Both parts are
 * required: a payload without `@`, or with either side empty, fails with
 * `invalid-profile`.
 */
function parseProfileKey(payload: string): ReferenceParseResult<ProfileReference> {
  const separator = payload.indexOf('@');
  if (separator <= 0 || separator === payload.length - 1) {
    return failure('invalid-profile');
  }
  return success<ProfileReference>({
    type: 'profile',
    key: payload.slice(0, separator),
    profile: payload.slice(separator + 1),
  });
}

/**
 * Resolves a `filename:` payload: the literal path if it exists, otherwise the
 * path joined to the search directory if that exists.
 *
 * @param filePath - Path as written in the entry.
 * @param searchPath - Directory to look in when the literal path is missing.
 * @param exists - Existence check.
 * @returns The resolved path, or undefined when neither exists.
 */
export function resolveReferencePath(
  filePath: string,
  searchPath: string | undefined,
  exists: PathExists
): string | undefined {
  if (filePath.length === 0) {
    return undefined;
  }
  if (exists(filePath)) {
    return filePath;
  }
  if (searchPath === undefined || searchPath.length === 0) {
    return undefined;
  }
  const joined = path.join(searchPath, filePath);
  return exists(joined) ? joined : undefined;
}

/**
 * Parses one sound entry.
 */
export function parseSoundReference(
  entry: string,
  context: ReferencePathContext
): ReferenceParseResult<SoundReference> {
  const profile = stripPrefix(entry, 'profile:');
  if (profile !== undefined) {
    return parseProfileKey(profile);
  }

  const filename = stripPrefix(entry, 'filename:');
  if (filename !== undefined) {
    const resolved = resolveReferencePath(filename, context.soundSearchPath, context.pathExists);
    return resolved === undefined
      ? failure('unresolved-path')
      : success<SoundReference>({ type: 'file', path: resolved });
  }

  return failure('unknown-prefix');
}

/**
 * Parses one volume entry. A `linear:` entry carries all three of its values.
 */
export function parseVolumeReference(entry: string): ReferenceParseResult<VolumeReference> {
  const profile = stripPrefix(entry, 'profile:');
  if (profile !== undefined) {
    return parseProfileKey(profile);
  }

  const fixed = stripPrefix(entry, 'fixed:');
  if (fixed !== undefined) {
    const level = parseInteger(fixed);
    return level === undefined ? failure('invalid-integer') : success<VolumeReference>({ type: 'fixed', level });
  }

  const linear = stripPrefix(entry, LINEAR_PREFIX);
  if (linear !== undefined) {
    const values = linear.split(ENTRY_SEPARATOR).map(parseInteger);
    const [start, middle, end] = values;
    if (values.length !== 3 || start === undefined || middle === undefined || end === undefined) {
      return failure('invalid-integer');
    }
    return success<VolumeReference>({ type: 'linear', level: start, ramp: [start, middle, end] });
  }

  return failure('unknown-prefix');
}

/**
 * Parses one vibration entry.
 */
export function parseVibrationReference(
  entry: string,
  context: ReferencePathContext
): ReferenceParseResult<VibrationReference> {
  const profile = stripPrefix(entry, 'profile:');
  if (profile !== undefined) {
    return parseProfileKey(profile);
  }

  const filename = stripPrefix(entry, 'filename:');
  if (filename !== undefined) {
    const resolved = resolveReferencePath(
      filename,
      context.vibrationSearchPath,
      context.pathExists
    );
    return resolved === undefined
      ? failure('unresolved-path')
      : success<VibrationReference>({ type: 'file', path: resolved });
  }

  const internal = stripPrefix(entry, 'internal:');
  if (internal !== undefined) {
    const id = parseInteger(internal);
    return id === undefined ? failure('invalid-integer') : success<VibrationReference>({ type: 'internal', id });
  }

  return failure('unknown-prefix');
}

/**
 * Splits a field value into entries. Entries are trimmed and empty ones are
 * skipped. In a volume field a `linear:` entry takes up to two following
 * integer tokens as its own, so `linear:10;20;30` stays one entry while
 * `linear:10;20;fixed:5` gives `linear:10;20` and `fixed:5`.
 *
 * @param value - Raw field value.
 * @param field - Which reference field the value belongs to.
 */
export function splitReferenceEntries(value: string, field: ReferenceField): string[] {
  const tokens = value.split(ENTRY_SEPARATOR).map((token) => token.trim());
  const entries: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || token.length === 0) {
      continue;
    }
    if (field === 'volume' && token.startsWith(LINEAR_PREFIX)) {
      const parts = [token];
      let next = tokens[i + 1];
      while (parts.length < 3 && next !== undefined && parseInteger(next) !== undefined) {
        parts.push(next);
        i++;
        next = tokens[i + 1];
      }
      entries.push(parts.join(ENTRY_SEPARATOR));
      continue;
    }
    entries.push(token);
  }

  return entries;
}

/**
 * Parses every entry of a multi-valued field, keeping source order and
 * dropping the entries that fail.
 *
 * @param value - Raw field value.
 * @param field - Which reference field the value belongs to.
 * @param parseEntry - Parser for a single entry.
 * @param onDropped - Called for each entry that fails.
 */
export function parseReferenceList<T>(
  value: string,
  field: ReferenceField,
  parseEntry: (entry: string) => ReferenceParseResult<T>,
  onDropped: (entry: string, reason: ReferenceFailureReason) => void
): T[] {
  const references: T[] = [];
  for (const entry of splitReferenceEntries(value, field)) {
    const result = parseEntry(entry);
    if (result.ok) {
      references.push(result.reference);
    } else {
      onDropped(entry, result.reason);
    }
  }
  return references;
}

/**
 * Returns the first entry of a field that parses. Entries after it are not
 * examined.
 *
 * @param value - Raw field value.
 * @param field - Which reference field the value belongs to.
 * @param parseEntry - Parser for a single entry.
 * @param onDropped - Called for each failing entry before the first success.
 */
export function parseFirstReference<T>(
  value: string,
  field: ReferenceField,
  parseEntry: (entry: string) => ReferenceParseResult<T>,
  onDropped: (entry: string, reason: ReferenceFailureReason) => void
): T | undefined {
  for (const entry of splitReferenceEntries(value, field)) {
    const result = parseEntry(entry);
    if (result.ok) {
      return result.reference;
    }
    onDropped(entry, result.reason);
  }
  return undefined;
}
