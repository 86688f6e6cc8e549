/**
 * The lint command: report deprecated table and filesystem references.
 */
import { Command } from 'commander';
import { createFormatter } from '../formatters/index.js';
import { createRunContext, lintFiles, lintExitCode } from '../runner.js';
import { logger } from '../../utils/logger.js';
import { addCommonOptions, configureLogging, resolveOutputFormat, type CommonOptions } from './shared.js';

interface LintCommandOptions extends CommonOptions {
  showClean?: boolean;
}

/**
 * Create the lint command.
 */
export function createLintCommand(): Command {
  const command = new Command('lint')
    .description('Report PySpark calls that use legacy table names or direct filesystem paths')
    .argument('[files...]', 'Files or glob patterns to lint')
    .option('--show-clean', 'Also list files without advisories');

  return addCommonOptions(command).action(async (filePatterns: string[], options: LintCommandOptions) => {
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

      const report = await lintFiles(ctx);
      const formatter = createFormatter(resolveOutputFormat(options, ctx.config), {
        colors: options.color,
        showClean: options.showClean,
      });
      console.log(formatter.formatLint(report));
      process.exit(lintExitCode(report, ctx.config));
    } catch (error) {
      logger.error('Lint failed', error instanceof Error ? error : undefined);
      process.exit(2);
    }
  });
}
