/**
 * In-memory configuration source backed by a TOML document.
 *
 * Every top-level table is a group and the quoted table header is the group
 * identifier:
 *
 * ```toml
 * [general]
 * sound_search_path = "/usr/share/sounds"
 *
 * ["event ringtone"]
 * audio_enabled = true
 *
 * ["event ringtone_loud@ringtone"]
 * volume = "fixed:100"
 * ```
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { TypedMap } from '../utils/typed-map.js';
import { findFloatFields, floatFieldKey } from './float-fields.js';
import type { LookupResult, TomlValueType } from './types.js';

/**
 * Error thrown when the source text is not valid TOML.
 */
export class SourceParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new SourceParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SourceParseError';
    this.cause = cause;
  }
}

/**
 * A number written as a TOML float. Kept apart from integers of the same
 * value, so `30.0` is not read as the integer 30.
 */
export class TomlFloat {
  public readonly value: number;

  constructor(value: number) {
    this.value = value;
  }
}

function markFloats(value: unknown): unknown {
  if (typeof value === 'number') {
    return new TomlFloat(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (typeof item === 'number' ? new TomlFloat(item) : item));
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Names the TOML type of a parsed value.
 *
 * @param value - A value produced by the TOML parser.
 */
export function describeTomlType(value: unknown): TomlValueType {
  if (typeof value === 'string') {
    return 'string';
  }
  if (typeof value === 'boolean') {
    return 'boolean';
  }
  if (value instanceof TomlFloat) {
    return 'float';
  }
  if (typeof value === 'bigint') {
    return 'integer';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Date) {
    return 'datetime';
  }
  return 'table';
}

function toSafeInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value;
  }
  if (
    typeof value === 'bigint' &&
    value >= BigInt(Number.MIN_SAFE_INTEGER) &&
    value <= BigInt(Number.MAX_SAFE_INTEGER)
  ) {
    return Number(value);
  }
  return undefined;
}

/**
 * An ordered collection of named groups, each a mapping from field name to a
 * raw TOML value, with typed lookups.
 */
export class ConfigurationSource {
  private readonly groups: TypedMap<string, TypedMap<string, unknown>>;

  /**
   * Creates a source from groups given in document order.
   *
   * @param groups - Group name and field entries for each group.
   */
  constructor(groups: Iterable<readonly [string, Iterable<readonly [string, unknown]>]>) {
    this.groups = new TypedMap();
    for (const [name, fields] of groups) {
      this.groups.set(name, TypedMap.fromEntries(fields));
    }
  }

  /**
   * Parses TOML text into a source. Top-level keys that are not tables are
   * ignored. Values written as floats are held as {@link TomlFloat}.
   *
   * @param text - TOML document.
   * @throws SourceParseError if the text is not valid TOML.
   */
  static parse(text: string): ConfigurationSource {
    let parsed: Record<string, unknown>;
    try {
      parsed = TOML.parse(text);
    } catch (error) {
      const tomlError = error instanceof Error ? error : new Error(String(error));
      throw new SourceParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
    }

    const floats = findFloatFields(text);
    const groups: [string, [string, unknown][]][] = [];
    for (const [name, value] of Object.entries(parsed)) {
      if (isRecord(value)) {
        groups.push([
          name,
          Object.entries(value).map(([field, raw]): [string, unknown] => [
            field,
            floats.has(floatFieldKey(name, field)) ? markFloats(raw) : raw,
          ]),
        ]);
      }
    }
    return new ConfigurationSource(groups);
  }

  /**
   * Group names in document order.
   */
  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  hasGroup(group: string): boolean {
    return this.groups.has(group);
  }

  private lookup<T>(
    group: string,
    field: string,
    convert: (value: unknown) => T | undefined
  ): LookupResult<T> {
    const fields = this.groups.get(group);
    if (fields === undefined || !fields.has(field)) {
      return { status: 'not-found' };
    }
    const value = fields.get(field);
    const converted = convert(value);
    if (converted === undefined) {
      return { status: 'type-error', actual: describeTomlType(value) };
    }
    return { status: 'ok', value: converted };
  }

  lookupString(group: string, field: string): LookupResult<string> {
    return this.lookup(group, field, (value) => (typeof value === 'string' ? value : undefined));
  }

  lookupInteger(group: string, field: string): LookupResult<number> {
    return this.lookup(group, field, toSafeInteger);
  }

  lookupBoolean(group: string, field: string): LookupResult<boolean> {
    return this.lookup(group, field, (value) => (typeof value === 'boolean' ? value : undefined));
  }

  /**
   * Reads an array whose every element is a string.
   */
  lookupStringArray(group: string, field: string): LookupResult<string[]> {
    return this.lookup(group, field, (value) => {
      if (!Array.isArray(value)) {
        return undefined;
      }
      const strings: string[] = [];
      for (const item of value) {
        if (typeof item !== 'string') {
          return undefined;
        }
        strings.push(item);
      }
      return strings;
    });
  }

  /**
   * Reads an array whose every element is an integer.
   */
  lookupIntegerArray(group: string, field: string): LookupResult<number[]> {
    return this.lookup(group, field, (value) => {
      if (!Array.isArray(value)) {
        return undefined;
      }
      const integers: number[] = [];
      for (const item of value) {
        const integer = toSafeInteger(item);
        if (integer === undefined) {
          return undefined;
        }
        integers.push(integer);
      }
      return integers;
    });
  }
}
