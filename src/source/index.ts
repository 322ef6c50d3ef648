/**
 * Configuration source: TOML groups with typed lookups, and loading from an
 * ordered list of candidate paths.
 *
 * @packageDocumentation
 */

export { ConfigurationSource, SourceParseError, TomlFloat, describeTomlType } from './source.js';
export { findFloatFields, floatFieldKey, isFloatLiteral } from './float-fields.js';
export { SourceLoadError, loadSource } from './loader.js';
export type { LoadedSource } from './loader.js';
export type { LoadAttempt, LookupResult, TextFileReader, TomlValueType } from './types.js';
