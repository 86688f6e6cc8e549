/**
 * Formatter type definitions.
 */
import type { OutputFormat } from '../../core/config/schema.js';
import type { FixReport, LintReport } from '../types.js';

export type { OutputFormat } from '../../core/config/schema.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Also list files without advisories */
  showClean: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatLint(report: LintReport): string;
  formatFix(report: FixReport): string;
}
