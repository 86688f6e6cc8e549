/**
 * Tests for the leveled logger.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('info');
    logger.setStream('stdout');
  });

  it('should drop messages below the level', () => {
    const log = new Logger();
    log.setLevel('warn');

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
  });

  it('should log nothing when silent', () => {
    const log = new Logger();
    log.setLevel('silent');

    log.error('hidden');
    log.info('hidden');

    expect(consoleSpy.error).not.toHaveBeenCalled();
    expect(consoleSpy.log).not.toHaveBeenCalled();
  });

  it('should print data after debug messages', () => {
    const log = new Logger();
    log.setLevel('debug');

    log.debug('rewrote call', { from: 'old.things' });

    expect(consoleSpy.log).toHaveBeenCalledTimes(2);
    expect(String(consoleSpy.log.mock.calls[0][0])).toContain('[DEBUG] rewrote call');
    expect(String(consoleSpy.log.mock.calls[1][0])).toContain('"from": "old.things"');
  });

  it('should prefix messages of child loggers', () => {
    logger.setLevel('debug');
    const child = logger.child('fix');

    child.debug('rewriting');
    child.info('done');
    expect(String(consoleSpy.log.mock.calls[0][0])).toContain('[DEBUG] [fix] rewriting');
    expect(String(consoleSpy.log.mock.calls[1][0])).toContain('[INFO] [fix] done');
  });

  it('should send debug and info to stderr when routed there', () => {
    const log = new Logger();
    log.setLevel('debug');
    log.setStream('stderr');

    log.debug('rewrote call', { from: 'old.things' });
    log.info('done');

    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(consoleSpy.error).toHaveBeenCalledTimes(3);
    expect(String(consoleSpy.error.mock.calls[0][0])).toContain('[DEBUG] rewrote call');
    expect(String(consoleSpy.error.mock.calls[2][0])).toContain('[INFO] done');
  });

  it('should pass the stream on to child loggers', () => {
    logger.setStream('stderr');
    const child = logger.child('fix');

    child.info('done');

    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(String(consoleSpy.error.mock.calls[0][0])).toContain('[INFO] [fix] done');
  });

  it('should print the stack of errors', () => {
    const log = new Logger();
    const error = new Error('boom');

    log.error('Lint failed', error);

    expect(consoleSpy.error).toHaveBeenCalledTimes(2);
    expect(String(consoleSpy.error.mock.calls[1][0])).toContain('boom');
  });
});
