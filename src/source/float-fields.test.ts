import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { findFloatFields, floatFieldKey, isFloatLiteral } from './float-fields.js';

function floatsOf(toml: string): string[] {
  return [...findFloatFields(toml)].map((key) => key.replace('\u0000', '.'));
}

describe('isFloatLiteral', () => {
  it('should accept fractions, exponents and special values', () => {
    for (const token of ['30.0', '-1.5', '+0.25', '5e3', '1E-2', '6.626e-34', '1_000.5', 'inf', '-inf', 'nan']) {
      expect(isFloatLiteral(token)).toBe(true);
    }
  });

  it('should reject integers, dates and other bare values', () => {
    for (const token of ['30', '-7', '1_000', '0xDEADBEEF', '0o17', '0b101', 'true', '1979-05-27', '07:32:00.5']) {
      expect(isFloatLiteral(token)).toBe(false);
    }
  });
});

describe('findFloatFields', () => {
  it('should report float fields under a quoted table header', () => {
    const toml = `
["event a"]
max_timeout = 30.0
audio_max_repeats = 3
sound = "filename:a.wav"
`;

    expect(floatsOf(toml)).toEqual(['event a.max_timeout']);
  });

  it('should give each group its own keys', () => {
    const floats = findFloatFields('["event a"]\nmax_timeout = 1.0\n\n["event b"]\nmax_timeout = 1\n');

    expect(floats.has(floatFieldKey('event a', 'max_timeout'))).toBe(true);
    expect(floats.has(floatFieldKey('event b', 'max_timeout'))).toBe(false);
  });

  it('should report arrays that hold a float', () => {
    const toml = `
[general]
system_volume = [
  0,  # muted
  50.0,
  100,
]
buffer_time = [1, 2]
`;

    expect(floatsOf(toml)).toEqual(['general.system_volume']);
  });

  it('should report dotted keys and inline tables at the root', () => {
    const toml = `
"event a".max_timeout = 2.5
"event b" = { max_timeout = 1e3, led_enabled = true }
`;

    expect(floatsOf(toml)).toEqual(['event a.max_timeout', 'event b.max_timeout']);
  });

  it('should ignore floats in subtables, arrays of tables and root keys', () => {
    const toml = `
ratio = 0.5

["event a".nested]
max_timeout = 1.5

[["vibra list"]]
strength = 0.75
`;

    expect(floatsOf(toml)).toEqual([]);
  });

  it('should not read float-like text inside strings or comments', () => {
    const toml = `
["event a"]
sound = "max_timeout = 1.0"
led_pattern = '''
max_timeout = 2.0
'''
event_id = """quoted \\""" 3.0"""
# max_timeout = 4.0
max_timeout = 5
`;

    expect(floatsOf(toml)).toEqual([]);
  });

  it('should decode escapes in quoted table names', () => {
    expect(floatsOf('["event \\u0061"]\nmax_timeout = 1.0\n')).toEqual(['event a.max_timeout']);
  });

  it('should treat a local date-time with a space as one value', () => {
    const toml = `
["event a"]
when = 1979-05-27 07:32:00
max_timeout = 1.5
`;

    expect(floatsOf(toml)).toEqual(['event a.max_timeout']);
  });

  it('should report exactly the fields written with a fraction (property-based)', () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { minLength: 1, maxLength: 8 }), (asFloat) => {
        const lines = asFloat.map((float, i) => `field_${String(i)} = ${float ? `${String(i)}.0` : String(i)}`);
        const floats = findFloatFields(`["event e"]\n${lines.join('\n')}\n`);

        asFloat.forEach((float, i) => {
          expect(floats.has(floatFieldKey('event e', `field_${String(i)}`))).toBe(float);
        });
      })
    );
  });
});
