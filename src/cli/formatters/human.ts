/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { Advisory } from '../../core/lint/types.js';
import { AdvisoryCodes } from '../../core/lint/types.js';
import type { FileLintResult, FixReport, LintReport } from '../types.js';
import type { FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      showClean: options.showClean ?? false,
    };
  }

  formatLint(report: LintReport): string {
    const lines: string[] = [];

    for (const result of report.results) {
      if (!this.options.showClean && result.advisories.length === 0 && !result.error) {
        continue;
      }
      lines.push(...this.formatFile(result));
      lines.push('');
    }

    const { files, advisories, failed } = report.summary;
    lines.push('═'.repeat(60));
    const advisoryText = this.colorize(
      `${advisories} ${advisories === 1 ? 'advisory' : 'advisories'}`,
      advisories > 0 ? 'yellow' : 'green'
    );
    const failedText = failed > 0 ? `, ${this.colorize(`${failed} failed`, 'red')}` : '';
    lines.push(`SUMMARY: ${advisoryText} in ${files} ${files === 1 ? 'file' : 'files'}${failedText}`);

    return lines.join('\n');
  }

  formatFix(report: FixReport): string {
    const lines: string[] = [];
    const verb = report.dryRun ? 'Would rewrite' : 'Rewrote';

    for (const result of report.results) {
      if (result.error) {
        lines.push(`${this.colorize('✗', 'red')} ${result.file}: ${result.error}`);
      } else if (result.changed) {
        lines.push(`${this.colorize('✓', 'green')} ${verb} ${result.file}`);
      }
    }

    const { files, changed, failed } = report.summary;
    const failedText = failed > 0 ? `, ${this.colorize(`${failed} failed`, 'red')}` : '';
    lines.push(`SUMMARY: ${changed} of ${files} ${files === 1 ? 'file' : 'files'} changed${failedText}`);

    return lines.join('\n');
  }

  private formatFile(result: FileLintResult): string[] {
    if (result.error) {
      return [`${this.colorize('✗', 'red')} ${result.file}`, `   ${this.colorize(result.error, 'red')}`];
    }
    if (result.advisories.length === 0) {
      return [`${this.colorize('✓', 'green')} ${result.file}`];
    }
    return [
      `${this.colorize('⚠', 'yellow')} ${result.file}`,
      ...result.advisories.map((advisory) => this.formatAdvisory(advisory)),
    ];
  }

  private formatAdvisory(advisory: Advisory): string {
    // 1-based for editors
    const location = `${advisory.span.startLine + 1}:${advisory.span.startColumn + 1}`;
    const color: Color = advisory.code === AdvisoryCodes.TABLE_MIGRATED_TO_UC ? 'cyan' : 'yellow';
    return `   ${this.colorize(location, 'dim')}  ${this.colorize(advisory.code, color)}  ${advisory.message}`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
