/**
 * Resolution of table names to their migrated destinations.
 */
import type { CurrentSessionState } from '../session/state.js';
import type {
  MigrationLookup,
  MigrationTarget,
  ResolvedMigration,
  TableIdentity,
} from './types.js';

/**
 * Splits a dotted table name into its parts.
 * Returns null for empty segments or more than three parts.
 */
export function parseTableIdentity(name: string): TableIdentity | null {
  const parts = name.split('.');
  if (parts.some((part) => part.length === 0)) return null;

  switch (parts.length) {
    case 1:
      return { parts: 1, table: parts[0] };
    case 2:
      return { parts: 2, schema: parts[0], table: parts[1] };
    case 3:
      return { parts: 3, catalog: parts[0], schema: parts[1], table: parts[2] };
    default:
      return null;
  }
}

export function formatTarget(target: MigrationTarget): string {
  return `${target.catalog}.${target.schema}.${target.table}`;
}

export class MigrationResolver {
  constructor(
    private readonly index: MigrationLookup,
    readonly session: CurrentSessionState
  ) {}

  /**
   * Resolves a table name to its migration target.
   *
   * Only `schema.table` names are looked up. Bare names have no safe
   * default, and three-part names are already fully qualified, so applying
   * a fix twice changes nothing. Names missing from the index are taken to
   * be out of migration scope.
   */
  resolve(name: string): ResolvedMigration | null {
    const identity = parseTableIdentity(name);
    if (!identity || identity.parts !== 2) return null;

    const target = this.index.lookup(identity.schema, identity.table);
    if (!target) return null;

    return { source: name, target, destination: formatTarget(target) };
  }
}
