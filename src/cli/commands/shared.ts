/**
 * Option handling shared by the commands.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { OutputFormat } from '../formatters/types.js';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json'];

export function parseOutputFormat(value: string): OutputFormat {
  const match = OUTPUT_FORMATS.find((format) => format === value);
  if (!match) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Unknown output format '${value}'. Use one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return match;
}

/**
 * --verbose enables debug output; --quiet hides everything below errors.
 */
export function applyLogLevel(options: { verbose?: boolean; quiet?: boolean }): void {
  if (options.quiet) {
    logger.setLevel('error');
  } else if (options.verbose) {
    logger.setLevel('debug');
  }
}
