/**
 * Definition groups.
 *
 * A definition maps a logical notification category to the events played
 * for it:
 *
 * ```toml
 * ["definition ringtone"]
 * long = "ringtone"
 * short = "ringtone_short"
 * meeting = "ringtone_meeting"
 * ```
 *
 * @packageDocumentation
 */

import type { ConfigurationSource } from '../source/source.js';
import type { Logger } from '../utils/logger.js';
import type { DiagnosticCollector } from './diagnostics.js';
import { parseGroupIdentifier } from './identifier.js';
import type { SettingsRegistry } from './registry.js';
import type { Definition } from './types.js';

const DEFINITION_FIELDS = ['long', 'short', 'meeting'] as const;

/**
 * Registry, diagnostics and logger shared by definition parsing.
 */
export interface DefinitionContext {
  readonly registry: SettingsRegistry;
  readonly diagnostics: DiagnosticCollector;
  readonly logger: Logger;
}

/**
 * Reads the optional `long`, `short` and `meeting` fields of a group. A field
 * that is not a string is reported and left out.
 *
 * @param source - Configuration source.
 * @param group - Group name as written in the source.
 * @param diagnostics - Receives type mismatches.
 */
export function readDefinition(
  source: ConfigurationSource,
  group: string,
  diagnostics: DiagnosticCollector
): Definition {
  const definition: { long?: string; short?: string; meeting?: string } = {};

  for (const field of DEFINITION_FIELDS) {
    const result = source.lookupString(group, field);
    if (result.status === 'ok') {
      definition[field] = result.value;
    } else if (result.status === 'type-error') {
      diagnostics.report({
        code: 'field-type-mismatch',
        level: 'warn',
        group,
        field,
        expected: 'string',
        actual: result.actual,
        fallback: 'absent',
      });
    }
  }

  return definition;
}

/**
 * Parses a definition group and registers it by name. A parent in the
 * identifier is ignored.
 *
 * @param source - Configuration source.
 * @param group - Group name as written in the source.
 * @param context - Registry, diagnostics and logger.
 * @returns The definition name, or undefined when the identifier is malformed.
 */
export function parseDefinitionGroup(
  source: ConfigurationSource,
  group: string,
  context: DefinitionContext
): string | undefined {
  const identifier = parseGroupIdentifier(group);
  if (identifier?.kind !== 'definition') {
    context.diagnostics.report({ code: 'malformed-identifier', level: 'debug', group });
    return undefined;
  }

  const definition = readDefinition(source, group, context.diagnostics);
  context.registry.setDefinition(identifier.name, definition);
  context.logger.debug('definition_created', { name: identifier.name, ...definition });
  return identifier.name;
}
