/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import { ConfigError, ErrorCodes, SparkMigrateError, SystemError } from '../../../src/utils/errors.js';

describe('SparkMigrateError', () => {
  it('should carry code, message and details', () => {
    const error = new SparkMigrateError('S999', 'Something failed', { file: 'a.py' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SparkMigrateError');
    expect(error.code).toBe('S999');
    expect(error.details).toEqual({ file: 'a.py' });
  });

  it('should serialize to JSON', () => {
    const error = new SystemError(ErrorCodes.PARSE_ERROR, 'Failed to parse', { line: 0 });

    expect(error.toJSON()).toEqual({
      name: 'SystemError',
      code: 'S001',
      message: 'Failed to parse',
      details: { line: 0 },
    });
  });
});

describe('error subclasses', () => {
  it('should keep their own names and the base type', () => {
    const config = new ConfigError(ErrorCodes.INVALID_INDEX, 'bad index');
    const system = new SystemError(ErrorCodes.FILE_NOT_FOUND, 'missing');

    expect(config.name).toBe('ConfigError');
    expect(system.name).toBe('SystemError');
    expect(config).toBeInstanceOf(SparkMigrateError);
    expect(system).toBeInstanceOf(SparkMigrateError);
  });
});
