/**
 * In-memory migration index.
 */
import type { MigrationLookup, MigrationStatus, MigrationTarget } from './types.js';

function indexKey(schema: string, table: string): string {
  return `${schema.toLowerCase()}.${table.toLowerCase()}`;
}

/**
 * Maps legacy `schema.table` names to their migrated destinations.
 * Lookups ignore case, as the metastore does.
 */
export class MigrationIndex implements MigrationLookup {
  private readonly entries = new Map<string, MigrationTarget>();

  constructor(statuses: readonly MigrationStatus[] = []) {
    for (const status of statuses) {
      const { dstCatalog, dstSchema, dstTable } = status;
      // Not migrated yet
      if (!dstCatalog || !dstSchema || !dstTable) continue;
      this.entries.set(indexKey(status.srcSchema, status.srcTable), {
        catalog: dstCatalog,
        schema: dstSchema,
        table: dstTable,
      });
    }
  }

  static empty(): MigrationIndex {
    return new MigrationIndex();
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(schema: string, table: string): MigrationTarget | null {
    return this.entries.get(indexKey(schema, table)) ?? null;
  }
}
