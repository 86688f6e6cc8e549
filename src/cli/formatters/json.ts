/**
 * JSON output formatter for machine consumption.
 */
import type { Advisory } from '../../core/lint/types.js';
import type { FixReport, LintReport } from '../types.js';
import type { IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatLint(report: LintReport): string {
    return JSON.stringify(
      {
        results: report.results.map((result) => ({
          file: result.file,
          advisories: result.advisories.map((a) => this.transformAdvisory(a)),
          ...(result.error !== undefined ? { error: result.error } : {}),
        })),
        summary: report.summary,
      },
      null,
      2
    );
  }

  formatFix(report: FixReport): string {
    return JSON.stringify(
      {
        dry_run: report.dryRun,
        results: report.results,
        summary: report.summary,
      },
      null,
      2
    );
  }

  private transformAdvisory(advisory: Advisory): Record<string, unknown> {
    return {
      code: advisory.code,
      message: advisory.message,
      start_line: advisory.span.startLine,
      start_col: advisory.span.startColumn,
      end_line: advisory.span.endLine,
      end_col: advisory.span.endColumn,
    };
  }
}
