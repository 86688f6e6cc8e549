/**
 * Zod schema for pattern catalog files (data/spark-patterns.yaml).
 */
import { z } from 'zod';

/** Schemes flagged when no per-matcher list is given. */
export const DEFAULT_FILESYSTEM_SCHEMES = [
  's3', 's3a', 's3n', 'wasb', 'wasbs', 'abfs', 'abfss', 'dbfs', 'hdfs', 'file',
];

/** Argument slot: a position, a keyword, or both. */
export const ArgumentSlotSchema = z
  .object({
    position: z.number().int().min(0).optional(),
    keyword: z.string().min(1).optional(),
  })
  .refine((slot) => slot.position !== undefined || slot.keyword !== undefined, {
    message: 'slot needs a position or a keyword',
  });

const MatcherName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier');

/** Dotted receiver chain, e.g. "dbutils.fs". */
const MatcherPrefix = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/, 'must be a dotted name')
  .optional();

export const FilesystemPathMatcherSchema = z.object({
  kind: z.literal('filesystem-path'),
  name: MatcherName,
  prefix: MatcherPrefix,
  slots: z.array(ArgumentSlotSchema).min(1),
  schemes: z.array(z.string().min(1)).optional(),
  defaults_to_managed_storage: z.boolean().default(false),
});

export const DirectTableNameMatcherSchema = z.object({
  kind: z.literal('direct-table-name'),
  name: MatcherName,
  prefix: MatcherPrefix,
  slot: ArgumentSlotSchema,
});

export const EmbeddedSqlMatcherSchema = z.object({
  kind: z.literal('embedded-sql'),
  name: MatcherName,
  prefix: MatcherPrefix,
  slot: ArgumentSlotSchema,
});

export const MatcherEntrySchema = z.discriminatedUnion('kind', [
  FilesystemPathMatcherSchema,
  DirectTableNameMatcherSchema,
  EmbeddedSqlMatcherSchema,
]);

export const PatternCatalogFileSchema = z.object({
  filesystem_schemes: z.array(z.string().min(1)).default(DEFAULT_FILESYSTEM_SCHEMES),
  matchers: z.array(MatcherEntrySchema),
});

export type ArgumentSlotEntry = z.infer<typeof ArgumentSlotSchema>;
export type MatcherEntry = z.infer<typeof MatcherEntrySchema>;
export type PatternCatalogFile = z.infer<typeof PatternCatalogFileSchema>;
