/**
 * Validation type definitions.
 */
import type { TemplateRules } from '../template/types.js';
import type { AllowedSet, ScalarValidations } from '../allow-lists/loaders.js';

/**
 * Errors and warnings collected for one document, in emission order.
 */
export interface DocumentIssues {
  errors: string[];
  warnings: string[];
}

/**
 * Static rule data loaded once per run and shared by every document.
 */
export interface ValidationContext {
  rules: TemplateRules;
  labels: AllowedSet;
  epicResources: AllowedSet;
  validations: ScalarValidations;
  /** Source names used in allow-list error messages */
  sources: {
    labels: string;
    epicResources: string;
  };
}

export type DocumentStatus = 'pass' | 'warn' | 'fail';

/**
 * Complete validation result for a file.
 */
export interface DocumentResult {
  /** Overall status */
  status: DocumentStatus;
  /** File path */
  file: string;
  errors: string[];
  warnings: string[];
  /** Set when the file could not be read or parsed as YAML */
  loadError?: string;
  /** Errors counted toward the run total (a load failure counts as one) */
  errorCount: number;
}

/**
 * Result of validating a directory of documents.
 */
export interface BatchResult {
  results: DocumentResult[];
  summary: {
    total: number;
    passed: number;
    warned: number;
    failed: number;
    totalErrors: number;
    totalWarnings: number;
  };
}
