/**
 * Configuration schema for `.waf/config.yaml`.
 */
import { z } from 'zod';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null are treated as "missing".
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Input file locations, relative to the project root. */
export const PathsSchema = z.object({
  template: z.string().default('waf_check_template.yml'),
  waf_dir: z.string().default('WAF'),
  labels: z.string().default('labels.yml'),
  validations: z.string().default('validations.yml'),
  epic_resources: z.string().default('epic_resources.yml'),
});

/** Validation settings. */
export const ValidationSettingsSchema = z.object({
  /** Keys validations.yml must define allowed values for */
  required_keys: z.array(z.string()).default(['impact', 'active', 'kql_check']),
});

/** Workbook export settings. */
export const ExportSettingsSchema = z.object({
  output_dir: z.string().default('excel'),
  patterns: z.array(z.string().min(1)).min(1).default(['*.yml', '*.yaml']),
});

export const ConfigSchema = z.object({
  paths: withDefaults(PathsSchema),
  validation: withDefaults(ValidationSettingsSchema),
  export: withDefaults(ExportSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PathsConfig = z.infer<typeof PathsSchema>;
export type ExportSettings = z.infer<typeof ExportSettingsSchema>;
