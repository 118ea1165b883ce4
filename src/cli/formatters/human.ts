import chalk from 'chalk';
import type { DocumentResult, BatchResult, DocumentStatus } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';

const STATUS_TAGS: Record<DocumentStatus, string> = {
  pass: '[OK]  ',
  warn: '[WARN]',
  fail: '[FAIL]',
};

/**
 * Line-oriented report: one block per file, headed by its status tag.
 *
 *   [FAIL] /repo/WAF/a.yml
 *     - Missing or empty mandatory key 'title'
 *     - WARNING: Optional key 'labels' is missing or empty
 *   [OK]   /repo/WAF/b.yml
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatResult(result: DocumentResult): string {
    const tag = this.colorize(STATUS_TAGS[result.status], result.status);

    if (result.loadError !== undefined) {
      return `${tag} ${result.file}: unable to load YAML (${result.loadError})`;
    }

    const lines = [`${tag} ${result.file}`];
    for (const error of result.errors) {
      lines.push(`  - ${error}`);
    }
    for (const warning of result.warnings) {
      lines.push(`  - WARNING: ${warning}`);
    }
    return lines.join('\n');
  }

  formatBatch(batch: BatchResult): string {
    return batch.results.map((result) => this.formatResult(result)).join('\n');
  }

  private colorize(text: string, status: DocumentStatus): string {
    if (!this.options.colors) {
      return text;
    }

    switch (status) {
      case 'pass':
        return chalk.green(text);
      case 'warn':
        return chalk.yellow(text);
      case 'fail':
        return chalk.red(text);
    }
  }
}
