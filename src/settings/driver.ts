/**
 * One resolution pass over a configuration source.
 *
 * Classifies every group, indexes the event groups by name, resolves and
 * materializes each event, then parses the definition groups. Problems with
 * single groups, fields or references are recorded as diagnostics and never
 * stop the pass.
 *
 * @packageDocumentation
 */

import type { ConfigurationSource } from '../source/source.js';
import { pathExists as fileExists } from '../utils/safe-fs.js';
import { TypedMap } from '../utils/typed-map.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { parseDefinitionGroup } from './definitions.js';
import { DiagnosticCollector } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import { GENERAL_GROUP, parseGeneralSettings } from './general.js';
import { classifyGroup, parseGroupIdentifier } from './identifier.js';
import { materializeEvent } from './materializer.js';
import type { MaterializeContext } from './materializer.js';
import { SettingsRegistry } from './registry.js';
import { PropertyResolver } from './resolver.js';
import type { IndexedEvent, PropertySet } from './resolver.js';
import { CyclicInheritanceError } from './types.js';
import type { PathExists } from './types.js';

/**
 * Options for a resolution pass.
 */
export interface ResolveOptions {
  /** Replaces `sound_search_path` from the `general` group. */
  readonly soundSearchPath?: string | undefined;
  /** Replaces `vibration_search_path` from the `general` group. */
  readonly vibrationSearchPath?: string | undefined;
  /**
   * Existence check for `filename:` references.
   * @defaultValue a file system check
   */
  readonly pathExists?: PathExists | undefined;
  /** Receives diagnostics and progress entries. */
  readonly logger?: Logger | undefined;
}

/**
 * Outcome of a resolution pass.
 */
export interface ResolutionResult {
  readonly registry: SettingsRegistry;
  /** Every problem recovered from, in the order it was found. */
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Indexes event groups by event name. A later group with the same name
 * replaces the earlier one.
 */
function indexGroups(
  source: ConfigurationSource,
  diagnostics: DiagnosticCollector
): { events: TypedMap<string, IndexedEvent>; definitions: string[] } {
  const events = new TypedMap<string, IndexedEvent>();
  const definitions: string[] = [];

  for (const group of source.groupNames()) {
    switch (classifyGroup(group)) {
      case 'definition':
        definitions.push(group);
        break;
      case 'event': {
        const identifier = parseGroupIdentifier(group);
        if (identifier === undefined) {
          diagnostics.report({ code: 'malformed-identifier', level: 'debug', group });
          break;
        }
        if (events.has(identifier.name)) {
          diagnostics.report({
            code: 'duplicate-group',
            level: 'warn',
            name: identifier.name,
            group,
          });
        }
        events.set(identifier.name, { group, identifier });
        break;
      }
      case 'general':
      case 'vibra':
      case undefined:
        break;
    }
  }

  return { events, definitions };
}

/**
 * Resolves a configuration source into a settings registry.
 *
 * @param source - The loaded configuration source.
 * @param options - Search path overrides, existence check and logger.
 * @returns The registry and the diagnostics of the pass.
 *
 * @example
 * ```typescript
 * const source = ConfigurationSource.parse(text);
 * const { registry, diagnostics } = resolveSettings(source, { pathExists: () => true });
 * registry.getEvent('ringtone')?.audioEnabled;
 * ```
 */
export function resolveSettings(
  source: ConfigurationSource,
  options: ResolveOptions = {}
): ResolutionResult {
  const logger = options.logger ?? defaultLogger;
  const diagnostics = new DiagnosticCollector(logger);
  const registry = new SettingsRegistry();

  const general = parseGeneralSettings(source, diagnostics, {
    soundSearchPath: options.soundSearchPath,
    vibrationSearchPath: options.vibrationSearchPath,
  });
  registry.setGeneral(general);

  const { events, definitions } = indexGroups(source, diagnostics);
  const resolver = new PropertyResolver(source, events, diagnostics);

  const resolved: [string, PropertySet][] = [];
  for (const name of events.keys()) {
    try {
      const properties = resolver.resolve(name);
      if (properties !== undefined) {
        resolved.push([name, properties]);
      }
    } catch (error) {
      if (!(error instanceof CyclicInheritanceError)) {
        throw error;
      }
      diagnostics.report({
        code: 'cyclic-inheritance',
        level: 'error',
        event: name,
        chain: error.chain,
      });
    }
  }

  const context: MaterializeContext = {
    registry,
    diagnostics,
    logger,
    paths: {
      soundSearchPath: general.soundSearchPath,
      vibrationSearchPath: general.vibrationSearchPath,
      pathExists: options.pathExists ?? fileExists,
    },
  };
  for (const [name, properties] of resolved) {
    materializeEvent(name, properties, context);
  }

  for (const group of definitions) {
    parseDefinitionGroup(source, group, context);
  }

  logger.info('settings_resolved', {
    general: source.hasGroup(GENERAL_GROUP),
    events: registry.eventNames().length,
    definitions: registry.definitionNames().length,
    diagnostics: diagnostics.all().length,
  });

  return { registry, diagnostics: diagnostics.all() };
}
