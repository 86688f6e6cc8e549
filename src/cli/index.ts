/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createLintCommand } from './commands/lint.js';
import { createFixCommand } from './commands/fix.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  const parsed = PackageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('spark-migrate')
    .description('Lint and rewrite PySpark code for Unity Catalog table migration')
    .version(readVersion());
  [createLintCommand, createFixCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
