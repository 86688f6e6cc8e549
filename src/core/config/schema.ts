/**
 * Configuration schema for .spark-migrate.yaml.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies its inner defaults when
 * missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** File discovery patterns. */
export const FileScanPatternsSchema = z.object({
  include: z.array(z.string()).default(['**/*.py']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/.venv/**',
    '**/venv/**',
    '**/site-packages/**',
  ]),
});

/** Catalog and schema the analyzed code runs against by default. */
export const SessionSettingsSchema = z.object({
  catalog: z.string().min(1).optional(),
  schema: z.string().min(1).optional(),
});

export const MigrationSettingsSchema = z.object({
  /** Path to the migration index file, relative to the project root */
  index_path: z.string().min(1).optional(),
});

export const OutputFormatSchema = z.enum(['human', 'json']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
});

export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  advisories: z.number().int().default(1),
  error: z.number().int().default(2),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z.object({
  files: withDefaults(FileScanPatternsSchema),
  session: withDefaults(SessionSettingsSchema),
  migration: withDefaults(MigrationSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  exit_codes: withDefaults(ExitCodesSchema),
  log_level: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
