/**
 * Types for resolved feedback settings.
 *
 * @packageDocumentation
 */

/**
 * Group kinds, named by the type tag that starts a group identifier.
 */
export const GROUP_KINDS = ['general', 'vibra', 'definition', 'event'] as const;

/**
 * Kind of a configuration group.
 */
export type GroupKind = (typeof GROUP_KINDS)[number];

/**
 * A parsed group identifier of the form `<kind> <name>[@<parent>]`.
 */
export interface GroupIdentifier {
  readonly kind: GroupKind;
  /** Bare name; never empty. */
  readonly name: string;
  /** Parent name; never empty when present. */
  readonly parent?: string;
}

/**
 * Value kinds known to the event property schema.
 */
export type PropertyKind = 'string' | 'int' | 'bool';

/**
 * A typed event property value.
 */
export type PropertyValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean };

/**
 * A value looked up by key in a named profile.
 */
export interface ProfileReference {
  readonly type: 'profile';
  readonly profile: string;
  readonly key: string;
}

/**
 * Sound resource reference.
 */
export type SoundReference = ProfileReference | { readonly type: 'file'; readonly path: string };

/**
 * Volume policy reference.
 *
 * A linear volume ramps through the three values of `ramp`; `level` is the
 * starting level.
 */
export type VolumeReference =
  | ProfileReference
  | { readonly type: 'fixed'; readonly level: number }
  | {
      readonly type: 'linear';
      readonly level: number;
      readonly ramp: readonly [number, number, number];
    };

/**
 * Vibration pattern reference.
 */
export type VibrationReference =
  | ProfileReference
  | { readonly type: 'file'; readonly path: string }
  | { readonly type: 'internal'; readonly id: number };

/**
 * Fully resolved feedback settings for one event.
 */
export interface EventDescriptor {
  readonly audioEnabled: boolean;
  readonly vibrationEnabled: boolean;
  readonly ledsEnabled: boolean;
  readonly backlightEnabled: boolean;
  /** Whether clients may supply their own sound for this event. */
  readonly allowCustom: boolean;
  /** Whether the vibration pattern is looked up from the sound file. */
  readonly lookupPattern: boolean;
  readonly silentEnabled: boolean;
  readonly toneGeneratorEnabled: boolean;
  readonly repeat: boolean;

  /** Maximum playback time in milliseconds; 0 means unlimited. */
  readonly maxTimeout: number;
  readonly numRepeats: number;
  /** Tone generator pattern id; -1 when unset. */
  readonly toneGeneratorPattern: number;
  readonly eventId?: string;
  readonly ledPattern?: string;

  /** Sounds in preference order. */
  readonly sounds: readonly SoundReference[];
  readonly volume?: VolumeReference;
  /** Vibration patterns in preference order. */
  readonly patterns: readonly VibrationReference[];
}

/**
 * Maps a logical notification category to concrete event names.
 */
export interface Definition {
  readonly long?: string;
  readonly short?: string;
  readonly meeting?: string;
}

/**
 * Daemon-wide settings from the `general` group.
 */
export interface GeneralSettings {
  /** Plugins that must load for the daemon to start. */
  readonly requiredPlugins: readonly string[];
  readonly soundSearchPath?: string;
  readonly vibrationSearchPath?: string;
  /** Audio buffer time in microseconds. */
  readonly audioBufferTime: number;
  /** Audio latency time in microseconds. */
  readonly audioLatencyTime: number;
  readonly systemVolume: readonly [number, number, number];
}

/**
 * Checks whether a path exists. Used to resolve `filename:` references.
 */
export type PathExists = (path: string) => boolean;

/**
 * Error thrown when an event's parent chain leads back to itself.
 */
export class CyclicInheritanceError extends Error {
  /** Event names along the cycle, starting and ending with the same name. */
  public readonly chain: readonly string[];

  /**
   * Creates a new CyclicInheritanceError.
   *
   * @param chain - The cycle, e.g. `['a', 'b', 'a']`.
   */
  constructor(chain: readonly string[]) {
    super(`Cyclic event inheritance: ${chain.join(' -> ')}`);
    this.name = 'CyclicInheritanceError';
    this.chain = chain;
  }
}
