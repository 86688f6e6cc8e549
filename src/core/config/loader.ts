/**
 * Configuration loading.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { CurrentSessionState } from '../session/state.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema, type SchemaParseResult } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes, SparkMigrateError } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.spark-migrate.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = getConfigPath(projectRoot, configPath);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  let result: SchemaParseResult<Config>;
  try {
    result = await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof SparkMigrateError) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${result.message}`,
      { path: fullPath, issues: result.issues }
    );
  }
  return result.data;
}

/**
 * Get the config file path for a project.
 */
export function getConfigPath(projectRoot: string, configPath?: string): string {
  return path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
}

/**
 * Session state described by the configuration.
 */
export function sessionFromConfig(config: Config): CurrentSessionState {
  return new CurrentSessionState(config.session.schema ?? null, config.session.catalog ?? null);
}
