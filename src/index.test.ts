import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fc from 'fast-check';
import { ConfigurationSource, VERSION, parseGroupIdentifier, resolveSettings } from './index.js';

describe('feedbackd-settings', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    beforeEach(() => {
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should resolve a source through the package entry point', () => {
      const source = ConfigurationSource.parse(`
["event ringtone"]
audio_enabled = true
volume = "linear:10;20;30"

["event ringtone_loud@ringtone"]
volume = "fixed:80"
`);

      const { registry } = resolveSettings(source, { pathExists: () => false });

      expect(registry.getEvent('ringtone')?.volume).toEqual({
        type: 'linear',
        level: 10,
        ramp: [10, 20, 30],
      });
      expect(registry.getEvent('ringtone_loud')?.audioEnabled).toBe(true);
      expect(registry.getEvent('ringtone_loud')?.volume).toEqual({ type: 'fixed', level: 80 });
    });

    it('should reject identifiers with an unknown type tag (property-based)', () => {
      const tag = fc
        .string({ minLength: 1 })
        .filter((s) => !s.includes(' ') && !['general', 'vibra', 'definition', 'event'].includes(s));

      fc.assert(
        fc.property(tag, fc.string({ minLength: 1 }), (prefix, rest) => {
          expect(parseGroupIdentifier(`${prefix} ${rest}`)).toBeUndefined();
        })
      );
    });
  });
});
