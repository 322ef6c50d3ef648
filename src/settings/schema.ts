/**
 * Static schema of the fields an event group may set.
 *
 * @packageDocumentation
 */

import type { PropertyValue } from './types.js';

/**
 * Schema entry: field name, expected kind and the default used by base events.
 */
export type SchemaEntry = { readonly field: string } & PropertyValue;

/**
 * Event fields in resolution order, with their defaults.
 */
export const EVENT_SCHEMA = [
  // general
  { field: 'max_timeout', kind: 'int', value: 0 },
  { field: 'allow_custom', kind: 'bool', value: false },

  // sound
  { field: 'audio_enabled', kind: 'bool', value: false },
  { field: 'audio_repeat', kind: 'bool', value: false },
  { field: 'audio_max_repeats', kind: 'int', value: 0 },
  { field: 'sound', kind: 'string', value: '' },
  { field: 'silent_enabled', kind: 'bool', value: false },
  { field: 'volume', kind: 'string', value: '' },
  { field: 'event_id', kind: 'string', value: '' },

  // tone generator
  { field: 'audio_tonegen_enabled', kind: 'bool', value: false },
  { field: 'audio_tonegen_pattern', kind: 'int', value: -1 },

  // vibration
  { field: 'vibration_enabled', kind: 'bool', value: false },
  { field: 'lookup_pattern', kind: 'bool', value: false },
  { field: 'vibration', kind: 'string', value: '' },

  // led
  { field: 'led_enabled', kind: 'bool', value: false },
  { field: 'led_pattern', kind: 'string', value: '' },

  // backlight
  { field: 'backlight_enabled', kind: 'bool', value: false },
] as const satisfies readonly SchemaEntry[];

/**
 * Name of a field in the event schema.
 */
export type EventField = (typeof EVENT_SCHEMA)[number]['field'];

/**
 * Fields of the event schema whose kind is `K`.
 */
export type EventFieldOfKind<K extends PropertyValue['kind']> = Extract<
  (typeof EVENT_SCHEMA)[number],
  { kind: K }
>['field'];

/**
 * Returns the schema default for a field.
 *
 * @param field - Event field name.
 */
export function schemaDefault(field: EventField): PropertyValue {
  const entry = EVENT_SCHEMA.find((candidate) => candidate.field === field);
  if (entry === undefined) {
    throw new Error(`Unknown event field: ${field}`);
  }
  return toPropertyValue(entry);
}

/**
 * Strips the field name from a schema entry, leaving its default value.
 */
export function toPropertyValue(entry: SchemaEntry): PropertyValue {
  switch (entry.kind) {
    case 'string':
      return { kind: 'string', value: entry.value };
    case 'int':
      return { kind: 'int', value: entry.value };
    case 'bool':
      return { kind: 'bool', value: entry.value };
  }
}
