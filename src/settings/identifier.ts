/**
 * Group identifier parsing.
 *
 * A group identifier is `<kind> <name>[@<parent>]`, where the kind is one of
 * `general`, `vibra`, `definition` or `event` followed by exactly one space.
 *
 * @packageDocumentation
 */

import { GROUP_KINDS } from './types.js';
import type { GroupIdentifier, GroupKind } from './types.js';

const PARENT_SEPARATOR = '@';

function isGroupKind(tag: string): tag is GroupKind {
  return GROUP_KINDS.some((kind) => kind === tag);
}

/**
 * Returns the kind named by a group's type tag, or undefined for an unknown
 * tag. The tag is everything before the first space, or the whole string
 * when there is no space, so the bare `general` group is classified too.
 *
 * @param raw - Group name as written in the source.
 */
export function classifyGroup(raw: string): GroupKind | undefined {
  const space = raw.indexOf(' ');
  const tag = space === -1 ? raw : raw.slice(0, space);
  return isGroupKind(tag) ? tag : undefined;
}

/**
 * Parses a group identifier into kind, name and optional parent.
 *
 * The remainder after the type tag is split once on `@`; there is no
 * escaping, so `event a@b@c` has name `a` and parent `b@c`.
 *
 * @param raw - Group name as written in the source.
 * @returns The identifier, or undefined when the tag is unknown, nothing
 * follows it, the name is empty, or a `@` has nothing after it.
 *
 * @example
 * ```typescript
 * parseGroupIdentifier('event ringtone_loud@ringtone');
 * // { kind: 'event', name: 'ringtone_loud', parent: 'ringtone' }
 * parseGroupIdentifier('event ');
 * // undefined
 * ```
 */
export function parseGroupIdentifier(raw: string): GroupIdentifier | undefined {
  const space = raw.indexOf(' ');
  if (space === -1) {
    return undefined;
  }

  const kind = classifyGroup(raw);
  if (kind === undefined) {
    return undefined;
  }

  const remainder = raw.slice(space + 1);
  const separator = remainder.indexOf(PARENT_SEPARATOR);
  const name = separator === -1 ? remainder : remainder.slice(0, separator);
  if (name.length === 0) {
    return undefined;
  }

  if (separator === -1) {
    return { kind, name };
  }

  const parent = remainder.slice(separator + 1);
  if (parent.length === 0) {
    return undefined;
  }
  return { kind, name, parent };
}
