/**
 * File discovery and per-file lint/fix orchestration behind the CLI commands.
 */
import * as path from 'node:path';
import { loadConfig, sessionFromConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { loadMigrationIndex } from '../core/migration/loader.js';
import { MigrationIndex } from '../core/migration/migration-index.js';
import type { MigrationLookup } from '../core/migration/types.js';
import { SparkTableLinter } from '../core/lint/spark-linter.js';
import { fileExists, globFiles, readFile, writeFile } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import type { FileFixResult, FileLintResult, FixReport, LintReport } from './types.js';

export interface RunOptions {
  /** Project root; config and relative paths resolve against it */
  cwd: string;
  /** Config file path */
  config?: string;
  /** Migration index path, overriding the config */
  index?: string;
  /** Files or glob patterns; the config's scan patterns when empty */
  files?: string[];
}

export interface RunContext {
  root: string;
  config: Config;
  linter: SparkTableLinter;
  files: string[];
}

export async function createRunContext(options: RunOptions): Promise<RunContext> {
  const root = path.resolve(options.cwd);
  const config = await loadConfig(root, options.config);
  const index = await resolveMigrationIndex(root, options.index ?? config.migration.index_path);
  const linter = new SparkTableLinter(index, { session: sessionFromConfig(config) });
  const files = await resolveFiles(root, config, options.files ?? []);
  return { root, config, linter, files };
}

async function resolveMigrationIndex(root: string, indexPath: string | undefined): Promise<MigrationLookup> {
  if (!indexPath) {
    logger.warn('No migration index configured; table references will not be reported.');
    return MigrationIndex.empty();
  }
  return loadMigrationIndex(path.resolve(root, indexPath));
}

/**
 * Resolves file arguments to sorted, de-duplicated paths relative to the root.
 * Existing files are taken as given; anything else is a glob pattern.
 */
export async function resolveFiles(root: string, config: Config, patterns: string[]): Promise<string[]> {
  const { include, exclude } = config.files;
  if (patterns.length === 0) {
    return globFiles(include, { cwd: root, ignore: exclude, absolute: false });
  }

  const found = new Set<string>();
  for (const pattern of patterns) {
    const resolved = path.resolve(root, pattern);
    if (await fileExists(resolved)) {
      found.add(path.relative(root, resolved));
      continue;
    }
    for (const file of await globFiles(pattern, { cwd: root, ignore: exclude, absolute: false })) {
      found.add(file);
    }
  }
  return [...found].sort();
}

export async function lintFiles(ctx: RunContext): Promise<LintReport> {
  const results: FileLintResult[] = [];

  for (const file of ctx.files) {
    try {
      const content = await readFile(path.resolve(ctx.root, file));
      results.push({ file, advisories: [...ctx.linter.lint(content)] });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Failed to lint ${file}`, { error: message });
      results.push({ file, advisories: [], error: message });
    }
  }

  return {
    results,
    summary: {
      files: results.length,
      advisories: results.reduce((sum, r) => sum + r.advisories.length, 0),
      failed: results.filter((r) => r.error !== undefined).length,
    },
  };
}

export async function fixFiles(ctx: RunContext, options: { dryRun: boolean }): Promise<FixReport> {
  const results: FileFixResult[] = [];

  for (const file of ctx.files) {
    const fullPath = path.resolve(ctx.root, file);
    try {
      const content = await readFile(fullPath);
      const fixed = ctx.linter.apply(content);
      const changed = fixed !== content;
      if (changed && !options.dryRun) {
        await writeFile(fullPath, fixed);
      }
      results.push({ file, changed });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Failed to fix ${file}`, { error: message });
      results.push({ file, changed: false, error: message });
    }
  }

  return {
    results,
    dryRun: options.dryRun,
    summary: {
      files: results.length,
      changed: results.filter((r) => r.changed).length,
      failed: results.filter((r) => r.error !== undefined).length,
    },
  };
}

export function lintExitCode(report: LintReport, config: Config): number {
  if (report.summary.failed > 0) return config.exit_codes.error;
  if (report.summary.advisories > 0) return config.exit_codes.advisories;
  return config.exit_codes.success;
}

export function fixExitCode(report: FixReport, config: Config): number {
  return report.summary.failed > 0 ? config.exit_codes.error : config.exit_codes.success;
}
