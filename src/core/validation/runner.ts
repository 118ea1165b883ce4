/**
 * Batch validation over a directory of WAF documents.
 */
import * as path from 'node:path';
import { loadTemplate } from '../template/parser.js';
import {
  DEFAULT_REQUIRED_VALIDATION_KEYS,
  loadAllowedLabels,
  loadEpicResources,
  loadValidations,
} from '../allow-lists/loaders.js';
import { globFilesSync } from '../../utils/file-system.js';
import { loadYamlSync } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';
import { checkDocument } from './checks.js';
import type { BatchResult, DocumentResult, ValidationContext } from './types.js';

export const DOCUMENT_PATTERNS = ['*.yml', '*.yaml'];

/** Absolute locations of everything a validation run reads. */
export interface ValidationPaths {
  template: string;
  wafDir: string;
  labels: string;
  validations: string;
  epicResources: string;
}

/**
 * Load the template rules and all allow-lists. Throws ConfigError on any
 * missing or unusable file.
 */
export function loadValidationContext(
  paths: ValidationPaths,
  requiredKeys: readonly string[] = DEFAULT_REQUIRED_VALIDATION_KEYS
): ValidationContext {
  const rules = loadTemplate(paths.template);
  const labels = loadAllowedLabels(paths.labels);
  const validations = loadValidations(paths.validations, requiredKeys);
  const epicResources = loadEpicResources(paths.epicResources);

  logger.child('validate').debug('Loaded validation context', {
    topLevelRules: rules.topLevel.size,
    nestedRules: rules.nested.size,
    labels: labels.size,
    epicResources: epicResources.size,
    validationKeys: [...validations.keys()],
  });

  return {
    rules,
    labels,
    epicResources,
    validations,
    sources: {
      labels: path.basename(paths.labels),
      epicResources: path.basename(paths.epicResources),
    },
  };
}

/**
 * YAML files directly inside `wafDir`, deduplicated and sorted by path.
 */
export function discoverDocuments(wafDir: string): string[] {
  const files = globFilesSync(DOCUMENT_PATTERNS, { cwd: wafDir });
  return [...new Set(files)].sort();
}

/**
 * Load and check one file. A file that cannot be read or parsed yields a
 * failed result rather than an exception.
 */
export function validateFile(file: string, context: ValidationContext): DocumentResult {
  let document: unknown;
  try {
    document = loadYamlSync(file);
  } catch (error) {
    return {
      status: 'fail',
      file,
      errors: [],
      warnings: [],
      loadError: error instanceof Error ? error.message : 'Unknown error',
      errorCount: 1,
    };
  }

  const { errors, warnings } = checkDocument(document, context);
  const status = errors.length > 0 ? 'fail' : warnings.length > 0 ? 'warn' : 'pass';
  return { status, file, errors, warnings, errorCount: errors.length };
}

/**
 * Validate files in order and aggregate the results.
 */
export function runValidation(files: string[], context: ValidationContext): BatchResult {
  const results = files.map((file) => validateFile(file, context));

  return {
    results,
    summary: {
      total: results.length,
      passed: results.filter((r) => r.status === 'pass').length,
      warned: results.filter((r) => r.status === 'warn').length,
      failed: results.filter((r) => r.status === 'fail').length,
      totalErrors: results.reduce((sum, r) => sum + r.errorCount, 0),
      totalWarnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
    },
  };
}

/**
 * Process exit code for a batch: 0 only when files were found and none
 * produced an error.
 */
export function getExitCode(batch: BatchResult): number {
  return batch.summary.total > 0 && batch.summary.totalErrors === 0 ? 0 : 1;
}
