/**
 * Migration index type definitions.
 */

/**
 * Migration state of one legacy (two-part) table. The destination is
 * absent until the table has actually been migrated.
 */
export interface MigrationStatus {
  srcSchema: string;
  srcTable: string;
  dstCatalog?: string | null;
  dstSchema?: string | null;
  dstTable?: string | null;
}

/**
 * Fully-qualified destination of a migrated table.
 */
export interface MigrationTarget {
  catalog: string;
  schema: string;
  table: string;
}

/**
 * Lookup from a legacy `schema.table` to its destination.
 */
export interface MigrationLookup {
  lookup(schema: string, table: string): MigrationTarget | null;
}

/**
 * A table name parsed into its dotted parts.
 */
export type TableIdentity =
  | { parts: 1; table: string }
  | { parts: 2; schema: string; table: string }
  | { parts: 3; catalog: string; schema: string; table: string };

/**
 * Outcome of resolving a table name that needs migration.
 */
export interface ResolvedMigration {
  /** Name as written in the source */
  source: string;
  target: MigrationTarget;
  /** `catalog.schema.table` text of the target */
  destination: string;
}
