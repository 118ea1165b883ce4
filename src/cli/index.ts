import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createValidateCommand } from './commands/validate.js';
import { createExportCommand } from './commands/export.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
const VERSION = pkg.version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('waf-checklist')
    .description('Validate and export WAF checklist YAML files')
    .version(VERSION);
  [createValidateCommand, createExportCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
