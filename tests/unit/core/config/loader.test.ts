import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig, getDefaultConfig } from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';
import { captureError } from '../../../helpers/capture.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `waf-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, '.waf'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should default every input path', () => {
      expect(getDefaultConfig().paths).toEqual({
        template: 'waf_check_template.yml',
        waf_dir: 'WAF',
        labels: 'labels.yml',
        validations: 'validations.yml',
        epic_resources: 'epic_resources.yml',
      });
    });

    it('should require impact, active and kql_check validations', () => {
      expect(getDefaultConfig().validation.required_keys).toEqual(['impact', 'active', 'kql_check']);
    });

    it('should default the export settings', () => {
      expect(getDefaultConfig().export).toEqual({
        output_dir: 'excel',
        patterns: ['*.yml', '*.yaml'],
      });
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no config file exists', () => {
      expect(loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should merge a partial file with defaults', async () => {
      await writeFile(
        join(testDir, '.waf', 'config.yaml'),
        'paths:\n  waf_dir: checklists\nexport:\n  output_dir: out\n'
      );

      const config = loadConfig(testDir);

      expect(config.paths.waf_dir).toBe('checklists');
      expect(config.paths.template).toBe('waf_check_template.yml');
      expect(config.export.output_dir).toBe('out');
      expect(config.export.patterns).toEqual(['*.yml', '*.yaml']);
    });

    it('should treat null sections as missing', async () => {
      await writeFile(join(testDir, '.waf', 'config.yaml'), 'paths:\nvalidation:\n');

      expect(loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load an explicit config path', async () => {
      await writeFile(join(testDir, 'waf.yaml'), 'validation:\n  required_keys: [impact]\n');

      expect(loadConfig(testDir, 'waf.yaml').validation.required_keys).toEqual(['impact']);
    });

    it('should fail for a missing explicit config path', () => {
      const error = captureError(() => loadConfig(testDir, 'nope.yaml'));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
    });

    it('should wrap schema violations in ConfigError', async () => {
      await writeFile(join(testDir, '.waf', 'config.yaml'), 'export:\n  patterns: []\n');

      const error = captureError(() => loadConfig(testDir));

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        code: ErrorCodes.CONFIG_LOAD_ERROR,
        message: expect.stringContaining('Failed to load config from'),
      });
    });
  });
});
