/**
 * Registry of resolved settings.
 *
 * Owns the resolved events, definitions, general settings and the interned
 * pools of resource references. A resolution pass creates one registry,
 * fills it and hands it to the caller, after which it is only read.
 *
 * @packageDocumentation
 */

import { TypedMap } from '../utils/typed-map.js';
import type {
  Definition,
  EventDescriptor,
  GeneralSettings,
  SoundReference,
  VibrationReference,
  VolumeReference,
} from './types.js';

/**
 * General settings used before the `general` group is read.
 */
export const DEFAULT_GENERAL_SETTINGS: GeneralSettings = {
  requiredPlugins: [],
  audioBufferTime: 0,
  audioLatencyTime: 0,
  systemVolume: [0, 0, 0],
};

/**
 * Canonical text of a reference, used as its interning key.
 */
export function referenceKey(reference: SoundReference | VolumeReference | VibrationReference): string {
  switch (reference.type) {
    case 'profile':
      return `profile:${reference.key}@${reference.profile}`;
    case 'file':
      return `filename:${reference.path}`;
    case 'fixed':
      return `fixed:${String(reference.level)}`;
    case 'linear':
      return `linear:${String(reference.level)}:${reference.ramp.join(';')}`;
    case 'internal':
      return `internal:${String(reference.id)}`;
  }
}

function intern<T extends SoundReference | VolumeReference | VibrationReference>(
  pool: TypedMap<string, T>,
  reference: T
): T {
  const key = referenceKey(reference);
  const existing = pool.get(key);
  if (existing !== undefined) {
    return existing;
  }
  pool.set(key, reference);
  return reference;
}

/**
 * Resolved settings of one configuration source.
 *
 * @example
 * ```typescript
 * const { registry } = resolveSettings(source);
 * const ringtone = registry.getEvent('ringtone');
 * const definition = registry.getDefinition('ringtone');
 * ```
 */
export class SettingsRegistry {
  private readonly events = new TypedMap<string, EventDescriptor>();
  private readonly definitions = new TypedMap<string, Definition>();
  private readonly sounds = new TypedMap<string, SoundReference>();
  private readonly volumes = new TypedMap<string, VolumeReference>();
  private readonly patterns = new TypedMap<string, VibrationReference>();
  private generalSettings: GeneralSettings = DEFAULT_GENERAL_SETTINGS;

  get general(): GeneralSettings {
    return this.generalSettings;
  }

  setGeneral(settings: GeneralSettings): void {
    this.generalSettings = settings;
  }

  /**
   * Registers an event, replacing any event with the same name.
   */
  setEvent(name: string, event: EventDescriptor): void {
    this.events.set(name, event);
  }

  getEvent(name: string): EventDescriptor | undefined {
    return this.events.get(name);
  }

  /**
   * Event names in registration order.
   */
  eventNames(): string[] {
    return [...this.events.keys()];
  }

  /**
   * Registers a definition, replacing any definition with the same name.
   */
  setDefinition(name: string, definition: Definition): void {
    this.definitions.set(name, definition);
  }

  getDefinition(name: string): Definition | undefined {
    return this.definitions.get(name);
  }

  definitionNames(): string[] {
    return [...this.definitions.keys()];
  }

  /**
   * Returns the shared instance for a sound reference, registering it if it
   * is new.
   */
  internSound(reference: SoundReference): SoundReference {
    return intern(this.sounds, reference);
  }

  internVolume(reference: VolumeReference): VolumeReference {
    return intern(this.volumes, reference);
  }

  internPattern(reference: VibrationReference): VibrationReference {
    return intern(this.patterns, reference);
  }

  soundPool(): SoundReference[] {
    return [...this.sounds.values()];
  }

  volumePool(): VolumeReference[] {
    return [...this.volumes.values()];
  }

  patternPool(): VibrationReference[] {
    return [...this.patterns.values()];
  }

  /**
   * Plain-object snapshot of the registry, suitable for JSON output.
   */
  toJSON(): {
    general: GeneralSettings;
    events: Record<string, EventDescriptor>;
    definitions: Record<string, Definition>;
  } {
    return {
      general: this.generalSettings,
      events: this.events.toObject(),
      definitions: this.definitions.toObject(),
    };
  }
}
