/**
 * Tests for config schema Zod validation.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, ExportSettingsSchema, PathsSchema } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should fill every section from an empty object', () => {
    expect(ConfigSchema.parse({})).toEqual({
      paths: {
        template: 'waf_check_template.yml',
        waf_dir: 'WAF',
        labels: 'labels.yml',
        validations: 'validations.yml',
        epic_resources: 'epic_resources.yml',
      },
      validation: { required_keys: ['impact', 'active', 'kql_check'] },
      export: { output_dir: 'excel', patterns: ['*.yml', '*.yaml'] },
    });
  });

  it('should treat a null section as missing', () => {
    const config = ConfigSchema.parse({ paths: null, export: { output_dir: 'out' } });

    expect(config.paths.waf_dir).toBe('WAF');
    expect(config.export).toEqual({ output_dir: 'out', patterns: ['*.yml', '*.yaml'] });
  });

  it('should keep partial overrides', () => {
    const config = ConfigSchema.parse({
      paths: { waf_dir: 'checks' },
      validation: { required_keys: ['impact'] },
    });

    expect(config.paths.waf_dir).toBe('checks');
    expect(config.paths.template).toBe('waf_check_template.yml');
    expect(config.validation.required_keys).toEqual(['impact']);
  });
});

describe('PathsSchema', () => {
  it('should reject non-string paths', () => {
    expect(PathsSchema.safeParse({ template: 3 }).success).toBe(false);
  });
});

describe('ExportSettingsSchema', () => {
  it('should require at least one non-empty pattern', () => {
    expect(ExportSettingsSchema.safeParse({ patterns: [] }).success).toBe(false);
    expect(ExportSettingsSchema.safeParse({ patterns: [''] }).success).toBe(false);
    expect(ExportSettingsSchema.safeParse({ patterns: ['*.yml'] }).success).toBe(true);
  });
});
