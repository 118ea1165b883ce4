import type { DocumentResult, BatchResult } from '../../core/validation/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private transform(result: DocumentResult): Record<string, unknown> {
    return {
      file: result.file,
      status: result.status,
      errors: result.errors,
      warnings: result.warnings,
      error_count: result.errorCount,
      ...(result.loadError !== undefined ? { load_error: result.loadError } : {}),
    };
  }

  formatResult(result: DocumentResult): string {
    return JSON.stringify(this.transform(result), null, 2);
  }

  formatBatch(batch: BatchResult): string {
    return JSON.stringify(
      {
        passed: batch.summary.totalErrors === 0 && batch.summary.total > 0,
        summary: {
          total: batch.summary.total,
          passed: batch.summary.passed,
          warned: batch.summary.warned,
          failed: batch.summary.failed,
          total_errors: batch.summary.totalErrors,
          total_warnings: batch.summary.totalWarnings,
        },
        results: batch.results.map((r) => this.transform(r)),
      },
      null,
      2
    );
  }
}
