import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationSource } from '../source/source.js';
import { Logger } from '../utils/logger.js';
import { resolveSettings } from './driver.js';
import type { ResolutionResult } from './driver.js';

const logger = new Logger({ component: 'test' });

function resolve(toml: string, existing: readonly string[] = []): ResolutionResult {
  const paths = new Set(existing);
  return resolveSettings(ConfigurationSource.parse(toml), {
    pathExists: (candidate) => paths.has(candidate),
    logger,
  });
}

const SETTINGS = `
[general]
plugins = "resource gst"
sound_search_path = "/usr/share/sounds"

["event ringtone"]
audio_enabled = true
sound = "profile:ringing.alert.tone@general;filename:ring.wav"
volume = "profile:ringing.alert.volume@general"

["event ringtone_loud@ringtone"]
volume = "fixed:100"

["event ringtone_silent@ringtone"]
audio_enabled = false

["definition ringtone"]
long = "ringtone"
short = "ringtone_silent"

["vibra strong"]
pattern = 1

["bogus group"]
`;

describe('resolveSettings', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('a complete source', () => {
    it('should register every event in group order', () => {
      const { registry, diagnostics } = resolve(SETTINGS, ['/usr/share/sounds/ring.wav']);

      expect(registry.eventNames()).toEqual(['ringtone', 'ringtone_loud', 'ringtone_silent']);
      expect(diagnostics).toEqual([]);
    });

    it('should resolve references against the general search path', () => {
      const { registry } = resolve(SETTINGS, ['/usr/share/sounds/ring.wav']);

      expect(registry.getEvent('ringtone')?.sounds).toEqual([
        { type: 'profile', key: 'ringing.alert.tone', profile: 'general' },
        { type: 'file', path: '/usr/share/sounds/ring.wav' },
      ]);
      expect(registry.getEvent('ringtone')?.volume).toEqual({
        type: 'profile',
        key: 'ringing.alert.volume',
        profile: 'general',
      });
    });

    it('should inherit and override through the parent', () => {
      const { registry } = resolve(SETTINGS, ['/usr/share/sounds/ring.wav']);

      const loud = registry.getEvent('ringtone_loud');
      expect(loud?.audioEnabled).toBe(true);
      expect(loud?.volume).toEqual({ type: 'fixed', level: 100 });
      expect(registry.getEvent('ringtone_silent')?.audioEnabled).toBe(false);
    });

    it('should share interned references between parent and children', () => {
      const { registry } = resolve(SETTINGS, ['/usr/share/sounds/ring.wav']);

      const parentSound = registry.getEvent('ringtone')?.sounds[0];
      expect(parentSound).toBeDefined();
      expect(registry.getEvent('ringtone_loud')?.sounds[0]).toBe(parentSound);
      expect(registry.soundPool()).toHaveLength(2);
      expect(registry.volumePool()).toHaveLength(2);
    });

    it('should register definitions and general settings', () => {
      const { registry } = resolve(SETTINGS);

      expect(registry.definitionNames()).toEqual(['ringtone']);
      expect(registry.getDefinition('ringtone')).toEqual({
        long: 'ringtone',
        short: 'ringtone_silent',
      });
      expect(registry.general.requiredPlugins).toEqual(['resource', 'gst']);
      expect(registry.general.soundSearchPath).toBe('/usr/share/sounds');
    });

    it('should resolve to the same registry contents on every pass', () => {
      const first = resolve(SETTINGS, ['/usr/share/sounds/ring.wav']);
      const second = resolve(SETTINGS, ['/usr/share/sounds/ring.wav']);

      expect(second.registry.toJSON()).toEqual(first.registry.toJSON());
      expect(second.registry).not.toBe(first.registry);
    });
  });

  describe('recovered problems', () => {
    it('should default a mistyped field and keep going', () => {
      const { registry, diagnostics } = resolve(`
["event base"]
max_timeout = "abc"
audio_enabled = true
`);

      expect(registry.getEvent('base')?.maxTimeout).toBe(0);
      expect(registry.getEvent('base')?.audioEnabled).toBe(true);
      expect(diagnostics.map((d) => d.code)).toEqual(['field-type-mismatch']);
    });

    it('should not take a whole-number float for an integer field', () => {
      const { registry, diagnostics } = resolve(`
["event a"]
max_timeout = 30.0
`);

      expect(registry.getEvent('a')?.maxTimeout).toBe(0);
      expect(diagnostics.map((d) => d.code)).toEqual(['field-type-mismatch']);
    });

    it('should keep a volume entry that follows a short linear ramp', () => {
      const { registry, diagnostics } = resolve(`
["event a"]
volume = "linear:10;20;fixed:5"
`);

      expect(registry.getEvent('a')?.volume).toEqual({ type: 'fixed', level: 5 });
      expect(diagnostics).toEqual([
        {
          code: 'malformed-reference',
          level: 'debug',
          event: 'a',
          field: 'volume',
          entry: 'linear:10;20',
          reason: 'invalid-integer',
        },
      ]);
    });

    it('should skip malformed identifiers', () => {
      const { registry, diagnostics } = resolve(`
["event "]
audio_enabled = true

["event @parent"]
audio_enabled = true

["event fine"]
`);

      expect(registry.eventNames()).toEqual(['fine']);
      expect(diagnostics).toEqual([
        { code: 'malformed-identifier', level: 'debug', group: 'event ' },
        { code: 'malformed-identifier', level: 'debug', group: 'event @parent' },
      ]);
    });

    it('should let a later group with the same event name win', () => {
      const { registry, diagnostics } = resolve(`
["event base"]
audio_enabled = true

["event sms"]
led_enabled = true

["event sms@base"]
vibration_enabled = true
`);

      const sms = registry.getEvent('sms');
      expect(sms?.audioEnabled).toBe(true);
      expect(sms?.vibrationEnabled).toBe(true);
      expect(sms?.ledsEnabled).toBe(false);
      expect(diagnostics).toEqual([
        { code: 'duplicate-group', level: 'warn', name: 'sms', group: 'event sms@base' },
      ]);
    });

    it('should treat an event with a missing parent as a base event', () => {
      const { registry, diagnostics } = resolve(`
["event orphan@nowhere"]
led_enabled = true
`);

      expect(registry.getEvent('orphan')?.ledsEnabled).toBe(true);
      expect(registry.getEvent('orphan')?.toneGeneratorPattern).toBe(-1);
      expect(diagnostics).toEqual([
        { code: 'unresolved-parent', level: 'warn', event: 'orphan', parent: 'nowhere' },
      ]);
    });

    it('should report cycles and skip the events on them and below them', () => {
      const { registry, diagnostics } = resolve(`
["event a@b"]
["event b@a"]
["event c@a"]
["event d"]
audio_enabled = true
`);

      expect(registry.eventNames()).toEqual(['d']);
      expect(diagnostics).toEqual([
        { code: 'cyclic-inheritance', level: 'error', event: 'a', chain: ['a', 'b', 'a'] },
        { code: 'cyclic-inheritance', level: 'error', event: 'b', chain: ['b', 'a', 'b'] },
        { code: 'cyclic-inheritance', level: 'error', event: 'c', chain: ['a', 'b', 'a'] },
      ]);
    });

    it('should drop unresolvable references and report them', () => {
      const { registry, diagnostics } = resolve(`
["event sms"]
sound = "filename:missing.wav;profile:sms.alert.tone@general"
vibration = "internal:x"
`);

      expect(registry.getEvent('sms')?.sounds).toEqual([
        { type: 'profile', key: 'sms.alert.tone', profile: 'general' },
      ]);
      expect(registry.getEvent('sms')?.patterns).toEqual([]);
      expect(diagnostics).toEqual([
        {
          code: 'malformed-reference',
          level: 'debug',
          event: 'sms',
          field: 'sound',
          entry: 'filename:missing.wav',
          reason: 'unresolved-path',
        },
        {
          code: 'malformed-reference',
          level: 'debug',
          event: 'sms',
          field: 'vibration',
          entry: 'internal:x',
          reason: 'invalid-integer',
        },
      ]);
    });
  });

  describe('search path overrides', () => {
    it('should resolve filenames against the override directory', () => {
      const { registry } = resolveSettings(
        ConfigurationSource.parse(`
[general]
sound_search_path = "/usr/share/sounds"
vibration_search_path = "/usr/share/vibra"

["event alarm"]
sound = "filename:alarm.wav"
vibration = "filename:alarm.ivt"
`),
        {
          soundSearchPath: '/opt/sounds',
          pathExists: (candidate) =>
            candidate === '/opt/sounds/alarm.wav' || candidate === '/usr/share/vibra/alarm.ivt',
          logger,
        }
      );

      expect(registry.general.soundSearchPath).toBe('/opt/sounds');
      expect(registry.getEvent('alarm')?.sounds).toEqual([
        { type: 'file', path: '/opt/sounds/alarm.wav' },
      ]);
      expect(registry.getEvent('alarm')?.patterns).toEqual([
        { type: 'file', path: '/usr/share/vibra/alarm.ivt' },
      ]);
    });
  });

  describe('an empty source', () => {
    it('should produce an empty registry with default general settings', () => {
      const { registry, diagnostics } = resolve('');

      expect(registry.eventNames()).toEqual([]);
      expect(registry.definitionNames()).toEqual([]);
      expect(registry.general.systemVolume).toEqual([0, 0, 0]);
      expect(diagnostics).toEqual([]);
    });
  });
});
