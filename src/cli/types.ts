/**
 * Report types produced by the CLI runner.
 */
import type { Advisory } from '../core/lint/types.js';

export interface FileLintResult {
  /** Path relative to the project root */
  file: string;
  advisories: Advisory[];
  /** Set when the file could not be read or parsed */
  error?: string;
}

export interface LintReport {
  results: FileLintResult[];
  summary: {
    files: number;
    advisories: number;
    failed: number;
  };
}

export interface FileFixResult {
  file: string;
  changed: boolean;
  error?: string;
}

export interface FixReport {
  results: FileFixResult[];
  dryRun: boolean;
  summary: {
    files: number;
    changed: number;
    failed: number;
  };
}
