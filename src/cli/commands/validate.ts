import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { PathsConfig } from '../../core/config/schema.js';
import {
  discoverDocuments,
  getExitCode,
  loadValidationContext,
  runValidation,
  type ValidationPaths,
} from '../../core/validation/runner.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import { applyLogLevel, parseOutputFormat } from './shared.js';

export interface ValidateOptions {
  root: string;
  template?: string;
  wafDir?: string;
  labels?: string;
  validations?: string;
  epicResources?: string;
  config?: string;
  format: string;
  color: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Resolve every input path against the root: CLI flags first, then config.
 */
export function resolveValidationPaths(
  root: string,
  configured: PathsConfig,
  options: Partial<ValidateOptions>
): ValidationPaths {
  return {
    template: path.resolve(root, options.template ?? configured.template),
    wafDir: path.resolve(root, options.wafDir ?? configured.waf_dir),
    labels: path.resolve(root, options.labels ?? configured.labels),
    validations: path.resolve(root, options.validations ?? configured.validations),
    epicResources: path.resolve(root, options.epicResources ?? configured.epic_resources),
  };
}

/**
 * Run a validation pass, print the report and return the exit code.
 * Configuration errors are logged and yield exit code 1.
 */
export function executeValidate(options: ValidateOptions): number {
  applyLogLevel(options);

  try {
    const format = parseOutputFormat(options.format);
    const root = path.resolve(options.root);
    const config = loadConfig(root, options.config);
    const paths = resolveValidationPaths(root, config.paths, options);

    const context = loadValidationContext(paths, config.validation.required_keys);

    const files = discoverDocuments(paths.wafDir);
    if (files.length === 0) {
      throw new ConfigError(ErrorCodes.NO_DOCUMENTS, `No YAML files found in ${paths.wafDir}`, {
        path: paths.wafDir,
      });
    }

    logger.debug(`Validating ${files.length} file(s) in ${paths.wafDir}`);
    const batch = runValidation(files, context);

    console.log(createFormatter({ format, colors: options.color }).formatBatch(batch));

    if (format === 'human') {
      const { summary } = batch;
      logger.info(
        `${summary.total} file(s): ${summary.passed} ok, ${summary.warned} with warnings, ` +
          `${summary.failed} failed (${summary.totalErrors} error(s))`
      );
    }

    return getExitCode(batch);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
    return 1;
  }
}

/**
 * Create the validate command.
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Validate WAF YAML files against the check template and allow-lists')
    .option('--root <dir>', 'Base directory containing the template and WAF folder', '.')
    .option('--template <path>', 'Template file relative to --root (default: waf_check_template.yml)')
    .option('--waf-dir <path>', 'Folder with WAF YAML definitions relative to --root (default: WAF)')
    .option('--labels <path>', 'labels.yml defining the allowed label names (default: labels.yml)')
    .option('--validations <path>', 'validations.yml describing allowed scalar values (default: validations.yml)')
    .option('--epic-resources <path>', 'epic_resources.yml listing allowed resource names (default: epic_resources.yml)')
    .option('--config <path>', 'Config file relative to --root (default: .waf/config.yaml)')
    .option('--format <format>', 'Output format: human or json', 'human')
    .option('--no-color', 'Disable colored output')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show the report and errors')
    .action((options: ValidateOptions) => {
      process.exit(executeValidate(options));
    });
}
