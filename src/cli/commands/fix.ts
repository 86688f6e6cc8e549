/**
 * The fix command: rewrite migrated table names in place.
 */
import { Command } from 'commander';
import { createFormatter } from '../formatters/index.js';
import { createRunContext, fixFiles, fixExitCode } from '../runner.js';
import { logger } from '../../utils/logger.js';
import { addCommonOptions, configureLogging, resolveOutputFormat, type CommonOptions } from './shared.js';

interface FixCommandOptions extends CommonOptions {
  dryRun?: boolean;
}

/**
 * Create the fix command.
 */
export function createFixCommand(): Command {
  const command = new Command('fix')
    .description('Rewrite legacy table names to their Unity Catalog names')
    .argument('[files...]', 'Files or glob patterns to fix')
    .option('--dry-run', 'Report files that would change without writing them');

  return addCommonOptions(command).action(async (filePatterns: string[], options: FixCommandOptions) => {
    configureLogging(options);
    try {
      const ctx = await createRunContext({
        cwd: process.cwd(),
        config: options.config,
        index: options.index,
        files: filePatterns,
      });
      configureLogging(options, ctx.config);

      if (ctx.files.length === 0) {
        logger.warn('No files found matching the given patterns.');
        process.exit(ctx.config.exit_codes.success);
      }

      const report = await fixFiles(ctx, { dryRun: options.dryRun ?? false });
      const formatter = createFormatter(resolveOutputFormat(options, ctx.config), {
        colors: options.color,
      });
      console.log(formatter.formatFix(report));
      process.exit(fixExitCode(report, ctx.config));
    } catch (error) {
      logger.error('Fix failed', error instanceof Error ? error : undefined);
      process.exit(2);
    }
  });
}
