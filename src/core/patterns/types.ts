/**
 * Call matcher type definitions.
 *
 * A matcher is a declarative rule: which call it recognizes and which
 * arguments carry a path, a table name or SQL text.
 */
import type { ArgumentSlot, SlotValue } from '../../python/call-site.js';

export type MatcherKind = 'filesystem-path' | 'direct-table-name' | 'embedded-sql';

interface CallMatcherBase {
  /** Method or function name, the last segment of the call's dotted name */
  readonly name: string;
  /** Receiver chain that must directly precede the name, or null to match on name alone */
  readonly requiredPrefix: readonly string[] | null;
}

/**
 * Calls taking a filesystem path. Slots are checked in order and the first
 * deprecated path wins.
 */
export interface FilesystemPathMatcher extends CallMatcherBase {
  readonly kind: 'filesystem-path';
  readonly slots: readonly ArgumentSlot[];
  /** Lower-case URI schemes whose direct use is deprecated */
  readonly schemes: ReadonlySet<string>;
  /** Whether a path without a scheme silently lands in managed (dbfs) storage */
  readonly defaultsToManagedStorage: boolean;
}

/**
 * Calls taking a table name as a string.
 */
export interface DirectTableNameMatcher extends CallMatcherBase {
  readonly kind: 'direct-table-name';
  readonly slot: ArgumentSlot;
}

/**
 * Calls taking SQL text that may reference tables.
 */
export interface EmbeddedSqlMatcher extends CallMatcherBase {
  readonly kind: 'embedded-sql';
  readonly slot: ArgumentSlot;
}

export type CallMatcher = FilesystemPathMatcher | DirectTableNameMatcher | EmbeddedSqlMatcher;

/**
 * A matcher that recognized a call, with the slots that held string constants.
 * `values` is never empty and follows the matcher's slot order.
 */
export interface CatalogMatch<M extends CallMatcher = CallMatcher> {
  matcher: M;
  values: SlotValue[];
}
