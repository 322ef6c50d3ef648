/**
 * Settings resolution: group identifiers, resource references, inheritance,
 * event materialization and definitions.
 *
 * @packageDocumentation
 */

export { CyclicInheritanceError, GROUP_KINDS } from './types.js';
export type {
  Definition,
  EventDescriptor,
  GeneralSettings,
  GroupIdentifier,
  GroupKind,
  PathExists,
  ProfileReference,
  PropertyKind,
  PropertyValue,
  SoundReference,
  VibrationReference,
  VolumeReference,
} from './types.js';
export { EVENT_SCHEMA, schemaDefault } from './schema.js';
export type { EventField, EventFieldOfKind, SchemaEntry } from './schema.js';
export { classifyGroup, parseGroupIdentifier } from './identifier.js';
export {
  parseFirstReference,
  parseInteger,
  parseReferenceList,
  parseSoundReference,
  parseVibrationReference,
  parseVolumeReference,
  resolveReferencePath,
  splitReferenceEntries,
} from './references.js';
export type {
  ReferenceParseFailure,
  ReferenceParseResult,
  ReferencePathContext,
} from './references.js';
export { DiagnosticCollector } from './diagnostics.js';
export type {
  Diagnostic,
  DiagnosticCode,
  ReferenceFailureReason,
  ReferenceField,
} from './diagnostics.js';
export { DEFAULT_GENERAL_SETTINGS, SettingsRegistry, referenceKey } from './registry.js';
export { PropertyResolver, lookupProperty } from './resolver.js';
export type { IndexedEvent, PropertySet } from './resolver.js';
export { materializeEvent } from './materializer.js';
export type { MaterializeContext } from './materializer.js';
export { parseDefinitionGroup, readDefinition } from './definitions.js';
export type { DefinitionContext } from './definitions.js';
export { GENERAL_GROUP, parseGeneralSettings } from './general.js';
export type { SearchPathOverrides } from './general.js';
export { resolveSettings } from './driver.js';
export type { ResolveOptions, ResolutionResult } from './driver.js';
export { buildLoaderConfig, loadSettings } from './load-settings.js';
export type { LoadSettingsOptions, LoadedSettings } from './load-settings.js';
