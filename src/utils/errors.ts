/**
 * Error types and codes for spark-migrate.
 *
 * The matching core never throws; these errors come from the edges:
 * parsing, configuration, the migration index and file access.
 */

/**
 * Base error class for all spark-migrate errors.
 */
export class SparkMigrateError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SparkMigrateError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (config file, pattern catalog, migration index).
 */
export class ConfigError extends SparkMigrateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends SparkMigrateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // System errors
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  FILE_READ_ERROR: 'S003',
  YAML_PARSE_ERROR: 'S004',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CATALOG: 'C002',
  INVALID_INDEX: 'C003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
