/**
 * The `general` group.
 *
 * ```toml
 * [general]
 * plugins = "resource transform gst"
 * sound_search_path = "/usr/share/sounds"
 * vibration_search_path = "/usr/share/vibra"
 * buffer_time = 200000
 * latency_time = 40000
 * system_volume = "0;60;100"
 * ```
 *
 * @packageDocumentation
 */

import type { ConfigurationSource } from '../source/source.js';
import type { DiagnosticCollector } from './diagnostics.js';
import { parseInteger } from './references.js';
import { DEFAULT_GENERAL_SETTINGS } from './registry.js';
import type { GeneralSettings } from './types.js';

/**
 * Name of the general settings group.
 */
export const GENERAL_GROUP = 'general';

/**
 * Search paths that take precedence over the ones in the source.
 */
export interface SearchPathOverrides {
  readonly soundSearchPath?: string | undefined;
  readonly vibrationSearchPath?: string | undefined;
}

type SystemVolume = GeneralSettings['systemVolume'];

function readPlugins(source: ConfigurationSource, diagnostics: DiagnosticCollector): string[] {
  const text = source.lookupString(GENERAL_GROUP, 'plugins');
  if (text.status === 'ok') {
    return text.value.split(/\s+/).filter((name) => name.length > 0);
  }
  if (text.status === 'not-found') {
    return [];
  }

  const list = source.lookupStringArray(GENERAL_GROUP, 'plugins');
  if (list.status === 'ok') {
    return list.value.filter((name) => name.length > 0);
  }
  diagnostics.report({
    code: 'invalid-general-value',
    level: 'warn',
    field: 'plugins',
    message: `expected a string or an array of strings, got ${text.actual}`,
  });
  return [];
}

function readString(
  source: ConfigurationSource,
  field: string,
  diagnostics: DiagnosticCollector
): string | undefined {
  const result = source.lookupString(GENERAL_GROUP, field);
  if (result.status === 'ok') {
    return result.value.length > 0 ? result.value : undefined;
  }
  if (result.status === 'type-error') {
    diagnostics.report({
      code: 'field-type-mismatch',
      level: 'warn',
      group: GENERAL_GROUP,
      field,
      expected: 'string',
      actual: result.actual,
      fallback: 'absent',
    });
  }
  return undefined;
}

function readInteger(
  source: ConfigurationSource,
  field: string,
  fallback: number,
  diagnostics: DiagnosticCollector
): number {
  const result = source.lookupInteger(GENERAL_GROUP, field);
  if (result.status === 'ok') {
    return result.value;
  }
  if (result.status === 'type-error') {
    diagnostics.report({
      code: 'field-type-mismatch',
      level: 'warn',
      group: GENERAL_GROUP,
      field,
      expected: 'int',
      actual: result.actual,
      fallback: { kind: 'int', value: fallback },
    });
  }
  return fallback;
}

function toSystemVolume(values: readonly (number | undefined)[]): SystemVolume | undefined {
  const [low, middle, high] = values;
  if (values.length !== 3 || low === undefined || middle === undefined || high === undefined) {
    return undefined;
  }
  return [low, middle, high];
}

/**
 * Reads `system_volume` as `"a;b;c"` or as an array of three integers.
 */
function readSystemVolume(
  source: ConfigurationSource,
  diagnostics: DiagnosticCollector
): SystemVolume {
  const text = source.lookupString(GENERAL_GROUP, 'system_volume');
  if (text.status === 'not-found') {
    return DEFAULT_GENERAL_SETTINGS.systemVolume;
  }

  let volume: SystemVolume | undefined;
  if (text.status === 'ok') {
    volume = toSystemVolume(text.value.split(';').map((part) => parseInteger(part.trim())));
  } else {
    const list = source.lookupIntegerArray(GENERAL_GROUP, 'system_volume');
    volume = list.status === 'ok' ? toSystemVolume(list.value) : undefined;
  }

  if (volume === undefined) {
    diagnostics.report({
      code: 'invalid-general-value',
      level: 'warn',
      field: 'system_volume',
      message: 'expected three integers as "a;b;c" or an array',
    });
    return DEFAULT_GENERAL_SETTINGS.systemVolume;
  }
  return volume;
}

/**
 * Parses the `general` group. A missing group yields the defaults.
 *
 * @param source - Configuration source.
 * @param diagnostics - Receives malformed values.
 * @param overrides - Search paths that replace the source's.
 */
export function parseGeneralSettings(
  source: ConfigurationSource,
  diagnostics: DiagnosticCollector,
  overrides: SearchPathOverrides = {}
): GeneralSettings {
  const soundSearchPath =
    overrides.soundSearchPath ?? readString(source, 'sound_search_path', diagnostics);
  const vibrationSearchPath =
    overrides.vibrationSearchPath ?? readString(source, 'vibration_search_path', diagnostics);

  return {
    requiredPlugins: readPlugins(source, diagnostics),
    ...(soundSearchPath !== undefined ? { soundSearchPath } : {}),
    ...(vibrationSearchPath !== undefined ? { vibrationSearchPath } : {}),
    audioBufferTime: readInteger(
      source,
      'buffer_time',
      DEFAULT_GENERAL_SETTINGS.audioBufferTime,
      diagnostics
    ),
    audioLatencyTime: readInteger(
      source,
      'latency_time',
      DEFAULT_GENERAL_SETTINGS.audioLatencyTime,
      diagnostics
    ),
    systemVolume: readSystemVolume(source, diagnostics),
  };
}
