/**
 * Property resolution with inheritance.
 *
 * An event group may name a parent event. Resolving an event resolves its
 * parent first, then overlays the fields the event sets itself. Base events
 * (no parent, or a parent that does not exist) start from the schema
 * defaults; derived events take whatever they do not set from the parent.
 *
 * @packageDocumentation
 */

import { TypedMap } from '../utils/typed-map.js';
import type { ConfigurationSource } from '../source/source.js';
import type { LookupResult } from '../source/types.js';
import type { DiagnosticCollector } from './diagnostics.js';
import { EVENT_SCHEMA, toPropertyValue } from './schema.js';
import type { EventField, SchemaEntry } from './schema.js';
import { CyclicInheritanceError } from './types.js';
import type { GroupIdentifier, PropertyValue } from './types.js';

/**
 * Merged field values of one event, in schema order.
 */
export type PropertySet = TypedMap<EventField, PropertyValue>;

/**
 * An event group and its parsed identifier.
 */
export interface IndexedEvent {
  /** Group name as written in the source. */
  readonly group: string;
  readonly identifier: GroupIdentifier;
}

type ResolutionState =
  | { readonly status: 'in-progress' }
  | { readonly status: 'done'; readonly properties: PropertySet };

const IN_PROGRESS: ResolutionState = { status: 'in-progress' };

/**
 * Reads one schema field from a group, converting it to a property value of
 * the field's kind.
 *
 * @param source - Configuration source.
 * @param group - Group name.
 * @param entry - Schema entry of the field.
 */
export function lookupProperty(
  source: ConfigurationSource,
  group: string,
  entry: SchemaEntry
): LookupResult<PropertyValue> {
  switch (entry.kind) {
    case 'string': {
      const result = source.lookupString(group, entry.field);
      return result.status === 'ok'
        ? { status: 'ok', value: { kind: 'string', value: result.value } }
        : result;
    }
    case 'int': {
      const result = source.lookupInteger(group, entry.field);
      return result.status === 'ok'
        ? { status: 'ok', value: { kind: 'int', value: result.value } }
        : result;
    }
    case 'bool': {
      const result = source.lookupBoolean(group, entry.field);
      return result.status === 'ok'
        ? { status: 'ok', value: { kind: 'bool', value: result.value } }
        : result;
    }
  }
}

/**
 * Resolves merged property sets for indexed events, memoizing each one.
 *
 * @example
 * ```typescript
 * const resolver = new PropertyResolver(source, index, diagnostics);
 * const loud = resolver.resolve('ringtone_loud');
 * loud?.get('audio_enabled'); // { kind: 'bool', value: true }
 * ```
 */
export class PropertyResolver {
  private readonly source: ConfigurationSource;
  private readonly index: TypedMap<string, IndexedEvent>;
  private readonly diagnostics: DiagnosticCollector;
  private readonly states = new TypedMap<string, ResolutionState>();
  private readonly chain: string[] = [];

  /**
   * @param source - Source the field values are read from.
   * @param index - Event groups by event name.
   * @param diagnostics - Receives type mismatches and unresolved parents.
   */
  constructor(
    source: ConfigurationSource,
    index: TypedMap<string, IndexedEvent>,
    diagnostics: DiagnosticCollector
  ) {
    this.source = source;
    this.index = index;
    this.diagnostics = diagnostics;
  }

  /**
   * Returns the merged property set of an event. A resolved event always
   * returns the same object.
   *
   * @param name - Event name.
   * @returns The property set, or undefined when no group defines the event.
   * @throws CyclicInheritanceError if the event's parent chain loops.
   */
  resolve(name: string): PropertySet | undefined {
    const state = this.states.get(name);
    if (state?.status === 'done') {
      return state.properties;
    }
    if (state?.status === 'in-progress') {
      const start = this.chain.indexOf(name);
      throw new CyclicInheritanceError([...this.chain.slice(start), name]);
    }

    const event = this.index.get(name);
    if (event === undefined) {
      return undefined;
    }

    this.states.set(name, IN_PROGRESS);
    this.chain.push(name);
    try {
      const properties = this.build(event);
      this.states.set(name, { status: 'done', properties });
      return properties;
    } finally {
      this.chain.pop();
      if (this.states.get(name)?.status === 'in-progress') {
        this.states.delete(name);
      }
    }
  }

  private build(event: IndexedEvent): PropertySet {
    const parentName = event.identifier.parent;
    let parent: PropertySet | undefined;
    if (parentName !== undefined) {
      parent = this.resolve(parentName);
      if (parent === undefined) {
        this.diagnostics.report({
          code: 'unresolved-parent',
          level: 'warn',
          event: event.identifier.name,
          parent: parentName,
        });
      }
    }

    const own = this.readOwnFields(event.group, parent === undefined);
    if (parent === undefined) {
      return own;
    }

    const merged = parent.clone();
    for (const [field, value] of own) {
      merged.set(field, value);
    }
    return merged;
  }

  /**
   * Reads every schema field the group sets. A base event fills the rest with
   * defaults; a derived event leaves them out.
   */
  private readOwnFields(group: string, isBase: boolean): PropertySet {
    const properties: PropertySet = new TypedMap();

    for (const entry of EVENT_SCHEMA) {
      const result = lookupProperty(this.source, group, entry);
      if (result.status === 'ok') {
        properties.set(entry.field, result.value);
        continue;
      }

      const fallback = toPropertyValue(entry);
      if (result.status === 'type-error') {
        this.diagnostics.report({
          code: 'field-type-mismatch',
          level: 'warn',
          group,
          field: entry.field,
          expected: entry.kind,
          actual: result.actual,
          fallback: isBase ? fallback : 'inherited',
        });
      }
      if (isBase) {
        properties.set(entry.field, fallback);
      }
    }

    return properties;
  }
}
