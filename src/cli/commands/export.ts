import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { exportWorkbook } from '../../core/export/workbook.js';
import { logger } from '../../utils/logger.js';
import { applyLogLevel } from './shared.js';

export interface ExportCommandOptions {
  root: string;
  wafDir?: string;
  outputDir?: string;
  pattern?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Split a comma-separated pattern list.
 */
export function parsePatterns(value: string): string[] {
  return value
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Write the workbook and return the exit code.
 */
export async function executeExport(options: ExportCommandOptions, now?: Date): Promise<number> {
  applyLogLevel(options);

  try {
    const root = path.resolve(options.root);
    const config = loadConfig(root, options.config);
    const patterns = options.pattern !== undefined ? parsePatterns(options.pattern) : config.export.patterns;

    const result = await exportWorkbook({
      wafDir: path.resolve(root, options.wafDir ?? config.paths.waf_dir),
      outputDir: path.resolve(root, options.outputDir ?? config.export.output_dir),
      patterns,
      now,
    });

    if (result.skipped > 0) {
      logger.info(`Skipped ${result.skipped} inactive file(s)`);
    }
    console.log(`Workbook created: ${result.outputPath}`);
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
    return 1;
  }
}

/**
 * Create the export command.
 */
export function createExportCommand(): Command {
  return new Command('export')
    .description('Create an Excel workbook summarizing the active WAF YAML files')
    .option('--root <dir>', 'Base directory that contains the WAF folder and output location', '.')
    .option('--waf-dir <path>', 'Folder with WAF YAML definitions relative to --root (default: WAF)')
    .option('--output-dir <path>', 'Directory that receives the workbook, relative to --root (default: excel)')
    .option('--pattern <patterns>', 'Comma-separated glob patterns for YAML files (default: *.yml,*.yaml)')
    .option('--config <path>', 'Config file relative to --root (default: .waf/config.yaml)')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show the result and errors')
    .action(async (options: ExportCommandOptions) => {
      process.exit(await executeExport(options));
    });
}
