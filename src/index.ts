/**
 * waf-checklist - validation and workbook export for WAF checklist YAML files.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Template rules
export * from './core/template/index.js';

// Allow-lists
export * from './core/allow-lists/index.js';

// Document values
export * from './core/document/values.js';

// Validation
export * from './core/validation/index.js';

// Workbook export
export * from './core/export/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
