/**
 * YAML parsing helpers.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFileSync } from './file-system.js';

const PARSE_OPTIONS = { version: '1.1', uniqueKeys: false } as const;

/**
 * Parse YAML content. An empty document parses to null.
 * Uses YAML 1.1 (`yes`/`no`/`on`/`off` are booleans, timestamps are Dates);
 * a repeated key keeps its last value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content, PARSE_OPTIONS) ?? null;
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Read and parse a YAML file synchronously.
 */
export function loadYamlSync(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to read file: ${filePath}`,
      { filePath, error }
    );
  }
  return parseYaml(content);
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): z.infer<T> {
  try {
    return parseYamlWithSchema(readFileSync(filePath), schema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to load YAML file: ${filePath}`,
      { filePath, error }
    );
  }
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
