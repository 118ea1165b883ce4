/**
 * Formatter type definitions.
 */
import type { DocumentResult, BatchResult } from '../../core/validation/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatResult(result: DocumentResult): string;
  formatBatch(batch: BatchResult): string;
}
