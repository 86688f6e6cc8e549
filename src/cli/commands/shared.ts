/**
 * Option handling shared by the lint and fix commands.
 */
import type { Command } from 'commander';
import { OutputFormatSchema, type OutputFormat } from '../../core/config/schema.js';
import type { Config } from '../../core/config/schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface CommonOptions {
  config?: string;
  index?: string;
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
  color?: boolean;
}

/**
 * Adds the options every command takes.
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file (default: .spark-migrate.yaml)')
    .option('--index <path>', 'Path to migration index file (overrides config)')
    .option('--format <format>', 'Output format: human or json')
    .option('--no-color', 'Disable colored output')
    .option('--quiet', 'Only print errors')
    .option('--verbose', 'Print debug output');
}

/**
 * Sets the log level from flags first, then from the config, and keeps
 * diagnostics off stdout when the report there is JSON.
 */
export function configureLogging(options: CommonOptions, config?: Config): void {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  } else if (config) {
    logger.setLevel(config.log_level);
  }
  const format = options.format ?? config?.output.format;
  logger.setStream(format === 'json' ? 'stderr' : 'stdout');
}

export function resolveOutputFormat(options: CommonOptions, config: Config): OutputFormat {
  if (options.format === undefined) return config.output.format;
  const parsed = OutputFormatSchema.safeParse(options.format);
  if (!parsed.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Unknown output format '${options.format}' (expected human or json)`,
      { format: options.format }
    );
  }
  return parsed.data;
}
