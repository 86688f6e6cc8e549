/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, readFileSync as fsReadFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileExists, globFiles, readFile, readFileSync, writeFile } from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'spark-migrate-fs-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read files sync and async', async () => {
    const file = join(tempDir, 'job.py');
    writeFileSync(file, 'print(1)\n');

    expect(await readFile(file)).toBe('print(1)\n');
    expect(readFileSync(file)).toBe('print(1)\n');
  });

  it('should create parent directories when writing', async () => {
    const file = join(tempDir, 'nested', 'dir', 'job.py');
    await writeFile(file, 'x = 1\n');

    expect(fsReadFileSync(file, 'utf-8')).toBe('x = 1\n');
  });

  it('should report whether a file exists', async () => {
    writeFileSync(join(tempDir, 'here.py'), '');

    expect(await fileExists(join(tempDir, 'here.py'))).toBe(true);
    expect(await fileExists(join(tempDir, 'gone.py'))).toBe(false);
  });

  it('should glob sorted relative paths and honor ignores', async () => {
    mkdirSync(join(tempDir, 'jobs'));
    mkdirSync(join(tempDir, 'node_modules'));
    writeFileSync(join(tempDir, 'jobs', 'b.py'), '');
    writeFileSync(join(tempDir, 'jobs', 'a.py'), '');
    writeFileSync(join(tempDir, 'node_modules', 'c.py'), '');

    expect(await globFiles('**/*.py', { cwd: tempDir, absolute: false })).toEqual(['jobs/a.py', 'jobs/b.py']);
  });
});
