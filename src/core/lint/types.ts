/**
 * Advisory and linter contract types.
 */
import type { PythonTree } from '../../python/python-tree.js';
import type { SourceSpan } from '../../python/types.js';

/** Advisory codes. Consumers match on these strings. */
export const AdvisoryCodes = {
  DIRECT_FILESYSTEM_ACCESS: 'direct-filesystem-access',
  IMPLICIT_DBFS_USAGE: 'implicit-dbfs-usage',
  TABLE_MIGRATED_TO_UC: 'table-migrated-to-uc',
} as const;

export type AdvisoryCode = (typeof AdvisoryCodes)[keyof typeof AdvisoryCodes];

/**
 * A single finding. The span is always the span of the call that caused it.
 */
export interface Advisory {
  readonly code: AdvisoryCode;
  readonly message: string;
  readonly span: SourceSpan;
}

/** Raw Python source, or a tree parsed from it. */
export type LintSource = string | PythonTree;

export interface Linter {
  /**
   * Produces advisories lazily in document order. The sequence can be
   * abandoned at any point.
   */
  lint(source: LintSource): Iterable<Advisory>;
}

export interface Fixer {
  readonly name: string;

  /**
   * Rewrites what can be migrated and returns the regenerated source.
   */
  apply(source: LintSource): string;
}
