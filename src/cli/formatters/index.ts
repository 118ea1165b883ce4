import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export { HumanFormatter, JsonFormatter };
export type { FormatOptions, IFormatter, OutputFormat } from './types.js';

/**
 * Create the formatter for an output format.
 */
export function createFormatter(options: FormatOptions): IFormatter {
  return options.format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
