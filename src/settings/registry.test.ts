import { describe, expect, it } from 'vitest';
import { DEFAULT_GENERAL_SETTINGS, SettingsRegistry, referenceKey } from './registry.js';
import type { EventDescriptor } from './types.js';

const SILENT: EventDescriptor = {
  audioEnabled: false,
  vibrationEnabled: false,
  ledsEnabled: false,
  backlightEnabled: false,
  allowCustom: false,
  lookupPattern: false,
  silentEnabled: false,
  toneGeneratorEnabled: false,
  repeat: false,
  maxTimeout: 0,
  numRepeats: 0,
  toneGeneratorPattern: -1,
  sounds: [],
  patterns: [],
};

describe('referenceKey', () => {
  it('should give each reference kind its own key', () => {
    expect(referenceKey({ type: 'profile', key: 'ringing.alert.tone', profile: 'general' })).toBe(
      'profile:ringing.alert.tone@general'
    );
    expect(referenceKey({ type: 'file', path: '/usr/share/sounds/ring.wav' })).toBe(
      'filename:/usr/share/sounds/ring.wav'
    );
    expect(referenceKey({ type: 'fixed', level: 80 })).toBe('fixed:80');
    expect(referenceKey({ type: 'linear', level: 10, ramp: [10, 20, 30] })).toBe(
      'linear:10:10;20;30'
    );
    expect(referenceKey({ type: 'internal', id: 3 })).toBe('internal:3');
  });
});

describe('SettingsRegistry', () => {
  it('should start with default general settings and nothing registered', () => {
    const registry = new SettingsRegistry();

    expect(registry.general).toBe(DEFAULT_GENERAL_SETTINGS);
    expect(registry.eventNames()).toEqual([]);
    expect(registry.definitionNames()).toEqual([]);
  });

  it('should replace events and definitions by name', () => {
    const registry = new SettingsRegistry();
    const loud = { ...SILENT, audioEnabled: true };

    registry.setEvent('sms', SILENT);
    registry.setEvent('sms', loud);
    registry.setDefinition('sms', { long: 'sms' });
    registry.setDefinition('sms', { short: 'sms_short' });

    expect(registry.getEvent('sms')).toBe(loud);
    expect(registry.getDefinition('sms')).toEqual({ short: 'sms_short' });
    expect(registry.getEvent('missing')).toBeUndefined();
  });

  it('should return the first instance of an equal reference', () => {
    const registry = new SettingsRegistry();
    const first = registry.internVolume({ type: 'fixed', level: 80 });

    expect(registry.internVolume({ type: 'fixed', level: 80 })).toBe(first);
    expect(registry.internVolume({ type: 'fixed', level: 81 })).not.toBe(first);
    expect(registry.volumePool()).toEqual([
      { type: 'fixed', level: 80 },
      { type: 'fixed', level: 81 },
    ]);
  });

  it('should keep separate pools per resource kind', () => {
    const registry = new SettingsRegistry();
    const profile = { type: 'profile', key: 'k', profile: 'p' } as const;

    registry.internSound(profile);
    registry.internPattern({ type: 'internal', id: 1 });

    expect(registry.soundPool()).toEqual([profile]);
    expect(registry.volumePool()).toEqual([]);
    expect(registry.patternPool()).toEqual([{ type: 'internal', id: 1 }]);
  });

  it('should serialize to a plain object', () => {
    const registry = new SettingsRegistry();
    registry.setEvent('ringtone', SILENT);
    registry.setDefinition('ringtone', { long: 'ringtone' });

    expect(JSON.parse(JSON.stringify(registry))).toEqual({
      general: {
        requiredPlugins: [],
        audioBufferTime: 0,
        audioLatencyTime: 0,
        systemVolume: [0, 0, 0],
      },
      events: { ringtone: SILENT },
      definitions: { ringtone: { long: 'ringtone' } },
    });
  });
});
