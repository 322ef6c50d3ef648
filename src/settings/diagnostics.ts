/**
 * Structured diagnostics for problems absorbed during resolution.
 *
 * Nothing short of a missing configuration source stops a resolution pass;
 * every skipped group, dropped reference or defaulted field is recorded here
 * so callers and tests can inspect it.
 *
 * @packageDocumentation
 */

import type { LogLevel, Logger } from '../utils/logger.js';
import type { TomlValueType } from '../source/types.js';
import type { PropertyKind, PropertyValue } from './types.js';

/**
 * Why a resource reference entry was dropped.
 */
export type ReferenceFailureReason =
  | 'unknown-prefix'
  | 'invalid-profile'
  | 'invalid-integer'
  | 'unresolved-path';

/**
 * Field kinds that carry resource references.
 */
export type ReferenceField = 'sound' | 'volume' | 'vibration';

/**
 * A recovered configuration problem.
 */
export type Diagnostic =
  | {
      readonly code: 'field-type-mismatch';
      readonly level: 'warn';
      /** Group the field belongs to. */
      readonly group: string;
      readonly field: string;
      readonly expected: PropertyKind;
      readonly actual: TomlValueType;
      /** The default used instead, or `inherited` when the parent supplies it. */
      readonly fallback: PropertyValue | 'inherited' | 'absent';
    }
  | { readonly code: 'malformed-identifier'; readonly level: 'debug'; readonly group: string }
  | {
      readonly code: 'duplicate-group';
      readonly level: 'warn';
      readonly name: string;
      /** The group that replaced the earlier one. */
      readonly group: string;
    }
  | {
      readonly code: 'unresolved-parent';
      readonly level: 'warn';
      readonly event: string;
      readonly parent: string;
    }
  | {
      readonly code: 'cyclic-inheritance';
      readonly level: 'error';
      readonly event: string;
      readonly chain: readonly string[];
    }
  | {
      readonly code: 'malformed-reference';
      readonly level: 'debug';
      readonly event: string;
      readonly field: ReferenceField;
      readonly entry: string;
      readonly reason: ReferenceFailureReason;
    }
  | {
      readonly code: 'invalid-general-value';
      readonly level: 'warn';
      readonly field: string;
      readonly message: string;
    };

/**
 * Diagnostic code.
 */
export type DiagnosticCode = Diagnostic['code'];

function toLogEvent(code: DiagnosticCode): string {
  return code.replace(/-/g, '_');
}

/**
 * Records diagnostics in order and mirrors each one to a logger at its level.
 *
 * @example
 * ```typescript
 * const diagnostics = new DiagnosticCollector(new Logger({ component: 'SettingsLoader' }));
 * diagnostics.report({ code: 'malformed-identifier', level: 'debug', group: 'event ' });
 * diagnostics.byCode('malformed-identifier'); // one entry
 * ```
 */
export class DiagnosticCollector {
  private readonly entries: Diagnostic[] = [];
  private readonly logger: Logger;

  /**
   * @param logger - Receives every reported diagnostic.
   */
  constructor(logger: Logger) {
    this.logger = logger;
  }

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    const { code, level, ...data } = diagnostic;
    const logLevel: LogLevel = level;
    this.logger.log(logLevel, toLogEvent(code), data);
  }

  /**
   * All diagnostics reported so far, in order.
   */
  all(): readonly Diagnostic[] {
    return [...this.entries];
  }

  /**
   * Diagnostics with the given code.
   */
  byCode<C extends DiagnosticCode>(code: C): Extract<Diagnostic, { code: C }>[] {
    return this.entries.filter(
      (entry): entry is Extract<Diagnostic, { code: C }> => entry.code === code
    );
  }
}
