/**
 * CLI statistics output
 *
 * Formats a preprocessing report for the terminal (written to stderr so
 * stdout carries only the diff).
 */

import type { PreprocessedDiff } from '../diff/index.js';

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

/**
 * Statistics formatter options
 */
export interface StatsFormatterOptions {
  /** Enable colored output */
  colors?: boolean;
}

/**
 * Formats preprocessing statistics as labelled lines
 */
export class StatsFormatter {
  private useColors: boolean;

  constructor(options: StatsFormatterOptions = {}) {
    this.useColors = options.colors ?? false;
  }

  /**
   * Color helper
   */
  private c(color: keyof typeof colors, text: string): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private line(label: string, value: string | number): string {
    return `${this.c('gray', `${label}:`.padEnd(10))} ${value}`;
  }

  /**
   * Render the report, one item per line
   */
  format(result: PreprocessedDiff): string {
    const { stats } = result;
    const excludedTotal = Object.values(stats.excluded).reduce((sum, n) => sum + (n ?? 0), 0);
    const excludedDetail = Object.entries(stats.excluded)
      .map(([reason, n]) => `${reason}=${n}`)
      .join(', ');
    const fits = stats.processedTokens <= stats.tokenLimit;

    const lines = [
      this.c('bold', 'diff-trim'),
      this.c('gray', '─'.repeat(40)),
      this.line('Mode', this.c('cyan', result.mode)),
      this.line(
        'Tokens',
        `${stats.originalTokens} -> ${this.c(fits ? 'green' : 'yellow', String(stats.processedTokens))} (limit ${stats.tokenLimit})`
      ),
      this.line(
        'Files',
        `${stats.sectionCount} total, ${stats.includedCount} included, ${excludedTotal} excluded`
      ),
    ];

    if (excludedDetail) {
      lines.push(this.line('Excluded', excludedDetail));
    }
    if (stats.skippedFiles.length > 0) {
      lines.push(this.line('Skipped', this.c('yellow', stats.skippedFiles.join(', '))));
    }
    if (stats.truncatedSection) {
      lines.push(this.line('Note', 'single file truncated to fit the budget'));
    }

    return `${lines.join('\n')}\n`;
  }
}
