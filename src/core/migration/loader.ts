/**
 * Loading of migration index files.
 */
import { z } from 'zod';
import { MigrationIndex } from './migration-index.js';
import { ConfigError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';

const MigrationStatusSchema = z.object({
  src_schema: z.string().min(1),
  src_table: z.string().min(1),
  dst_catalog: z.string().min(1).nullish(),
  dst_schema: z.string().min(1).nullish(),
  dst_table: z.string().min(1).nullish(),
});

/** Migration index file: YAML (or JSON) with a `tables` list. */
export const MigrationIndexFileSchema = z.object({
  tables: z.array(MigrationStatusSchema).default([]),
});

export type MigrationIndexFile = z.infer<typeof MigrationIndexFileSchema>;

/**
 * Builds an index from validated file contents.
 */
export function createMigrationIndex(file: MigrationIndexFile): MigrationIndex {
  return new MigrationIndex(
    file.tables.map((entry) => ({
      srcSchema: entry.src_schema,
      srcTable: entry.src_table,
      dstCatalog: entry.dst_catalog,
      dstSchema: entry.dst_schema,
      dstTable: entry.dst_table,
    }))
  );
}

/**
 * Loads a migration index file.
 */
export async function loadMigrationIndex(filePath: string): Promise<MigrationIndex> {
  if (!(await fileExists(filePath))) {
    throw new SystemError(
      ErrorCodes.FILE_NOT_FOUND,
      `Migration index not found: ${filePath}`,
      { path: filePath }
    );
  }

  const result = await loadYamlWithSchema(filePath, MigrationIndexFileSchema);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_INDEX,
      `Invalid migration index ${filePath}: ${result.message}`,
      { path: filePath, issues: result.issues }
    );
  }

  const index = createMigrationIndex(result.data);
  logger.debug(`Loaded migration index with ${index.size} migrated tables`, { path: filePath });
  return index;
}
