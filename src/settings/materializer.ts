/**
 * Turns a merged property set into a typed event descriptor.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import type {
  DiagnosticCollector,
  ReferenceFailureReason,
  ReferenceField,
} from './diagnostics.js';
import {
  parseFirstReference,
  parseReferenceList,
  parseSoundReference,
  parseVibrationReference,
  parseVolumeReference,
} from './references.js';
import type { ReferencePathContext } from './references.js';
import type { SettingsRegistry } from './registry.js';
import type { PropertySet } from './resolver.js';
import { schemaDefault } from './schema.js';
import type { EventFieldOfKind } from './schema.js';
import type { EventDescriptor } from './types.js';

/**
 * Everything an event needs besides its own properties.
 */
export interface MaterializeContext {
  /** Receives the event and interns its references. */
  readonly registry: SettingsRegistry;
  readonly diagnostics: DiagnosticCollector;
  readonly logger: Logger;
  /** Search paths and existence check for `filename:` entries. */
  readonly paths: ReferencePathContext;
}

function readBool(properties: PropertySet, field: EventFieldOfKind<'bool'>): boolean {
  const value = properties.get(field) ?? schemaDefault(field);
  return value.kind === 'bool' ? value.value : false;
}

function readInt(properties: PropertySet, field: EventFieldOfKind<'int'>): number {
  const value = properties.get(field) ?? schemaDefault(field);
  return value.kind === 'int' ? value.value : 0;
}

/**
 * Reads a string field; the empty string counts as unset.
 */
function readString(
  properties: PropertySet,
  field: EventFieldOfKind<'string'>
): string | undefined {
  const value = properties.get(field);
  return value?.kind === 'string' && value.value.length > 0 ? value.value : undefined;
}

/**
 * Builds the descriptor for one event, interns its references and registers
 * it under `name`, replacing any earlier event of that name.
 *
 * @param name - Event name.
 * @param properties - The event's merged property set.
 * @param context - Registry, diagnostics and path resolution.
 * @returns The registered descriptor.
 *
 * @example
 * ```typescript
 * const descriptor = materializeEvent('ringtone', properties, context);
 * descriptor.sounds; // [{ type: 'profile', key: 'ringing.alert.tone', profile: 'general' }]
 * ```
 */
export function materializeEvent(
  name: string,
  properties: PropertySet,
  context: MaterializeContext
): EventDescriptor {
  const { registry, diagnostics } = context;

  const dropped =
    (field: ReferenceField) =>
    (entry: string, reason: ReferenceFailureReason): void => {
      diagnostics.report({
        code: 'malformed-reference',
        level: 'debug',
        event: name,
        field,
        entry,
        reason,
      });
    };

  const soundValue = readString(properties, 'sound');
  const sounds =
    soundValue === undefined
      ? []
      : parseReferenceList(
          soundValue,
          'sound',
          (entry) => parseSoundReference(entry, context.paths),
          dropped('sound')
        ).map((reference) => registry.internSound(reference));

  const volumeValue = readString(properties, 'volume');
  const parsedVolume =
    volumeValue === undefined
      ? undefined
      : parseFirstReference(volumeValue, 'volume', parseVolumeReference, dropped('volume'));
  const volume = parsedVolume === undefined ? undefined : registry.internVolume(parsedVolume);

  const vibrationValue = readString(properties, 'vibration');
  const patterns =
    vibrationValue === undefined
      ? []
      : parseReferenceList(
          vibrationValue,
          'vibration',
          (entry) => parseVibrationReference(entry, context.paths),
          dropped('vibration')
        ).map((reference) => registry.internPattern(reference));

  const eventId = readString(properties, 'event_id');
  const ledPattern = readString(properties, 'led_pattern');

  const descriptor: EventDescriptor = {
    audioEnabled: readBool(properties, 'audio_enabled'),
    vibrationEnabled: readBool(properties, 'vibration_enabled'),
    ledsEnabled: readBool(properties, 'led_enabled'),
    backlightEnabled: readBool(properties, 'backlight_enabled'),
    allowCustom: readBool(properties, 'allow_custom'),
    lookupPattern: readBool(properties, 'lookup_pattern'),
    silentEnabled: readBool(properties, 'silent_enabled'),
    toneGeneratorEnabled: readBool(properties, 'audio_tonegen_enabled'),
    repeat: readBool(properties, 'audio_repeat'),
    maxTimeout: readInt(properties, 'max_timeout'),
    numRepeats: readInt(properties, 'audio_max_repeats'),
    toneGeneratorPattern: readInt(properties, 'audio_tonegen_pattern'),
    ...(eventId !== undefined ? { eventId } : {}),
    ...(ledPattern !== undefined ? { ledPattern } : {}),
    sounds,
    ...(volume !== undefined ? { volume } : {}),
    patterns,
  };

  registry.setEvent(name, descriptor);
  context.logger.debug('event_created', {
    name,
    sounds: sounds.length,
    patterns: patterns.length,
  });
  return descriptor;
}
