/**
 * Loaders for the three allow-list files: labels, epic resource names and
 * scalar validations. Each one fails with a ConfigError when its file is
 * missing or yields nothing usable.
 */
import * as path from 'node:path';
import { ConfigError, ErrorCodes, type ErrorCode } from '../../utils/errors.js';
import { fileExistsSync } from '../../utils/file-system.js';
import { loadYamlSync } from '../../utils/yaml.js';
import { hasValue, isMapping } from '../document/values.js';
import { normalizeListEntry, normalizeScalar } from './normalize.js';
import { collectStrings } from './tree.js';

export type AllowedSet = ReadonlySet<string>;

/** Document key → allowed normalized scalar values. */
export type ScalarValidations = ReadonlyMap<string, AllowedSet>;

export const DEFAULT_REQUIRED_VALIDATION_KEYS: readonly string[] = ['impact', 'active', 'kql_check'];

function readAllowListFile(filePath: string, description: string, notFoundCode: ErrorCode): unknown {
  if (!fileExistsSync(filePath)) {
    throw new ConfigError(notFoundCode, `${description} file not found: ${filePath}`, {
      path: filePath,
    });
  }
  try {
    return loadYamlSync(filePath);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load ${path.basename(filePath)}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { path: filePath }
    );
  }
}

/**
 * Build the label allow-list from a bare list or a `labels:` list.
 */
export function buildLabelSet(data: unknown, source = 'labels.yml'): AllowedSet {
  const rawLabels = isMapping(data) ? data.labels : data;
  if (!Array.isArray(rawLabels)) {
    throw new ConfigError(
      ErrorCodes.LABELS_INVALID,
      `${source} must contain a list (optionally under 'labels')`
    );
  }

  const allowed = new Set<string>();
  for (const entry of rawLabels) {
    const label = normalizeListEntry(entry);
    if (label !== null) allowed.add(label);
  }
  if (allowed.size === 0) {
    throw new ConfigError(ErrorCodes.LABELS_INVALID, `${source} does not define any labels`);
  }
  return allowed;
}

export function loadAllowedLabels(labelsPath: string): AllowedSet {
  const data = readAllowListFile(labelsPath, 'Labels', ErrorCodes.LABELS_NOT_FOUND);
  return buildLabelSet(data, path.basename(labelsPath));
}

/**
 * Build the resource-name allow-list from every string in an arbitrarily
 * nested structure.
 */
export function buildResourceSet(data: unknown, source = 'epic_resources.yml'): AllowedSet {
  if (data === null || data === undefined) {
    throw new ConfigError(ErrorCodes.RESOURCES_INVALID, `${source} is empty`);
  }

  const resources = new Set<string>();
  for (const found of collectStrings(data)) {
    const name = normalizeListEntry(found);
    if (name !== null) resources.add(name);
  }
  if (resources.size === 0) {
    throw new ConfigError(ErrorCodes.RESOURCES_INVALID, `${source} does not define any resources`);
  }
  return resources;
}

export function loadEpicResources(resourcesPath: string): AllowedSet {
  const data = readAllowListFile(resourcesPath, 'Epic resources', ErrorCodes.RESOURCES_NOT_FOUND);
  return buildResourceSet(data, path.basename(resourcesPath));
}

/**
 * Build scalar allow-lists from a mapping of key → non-empty list.
 * Every key in `requiredKeys` must be present.
 */
export function buildValidations(
  data: unknown,
  requiredKeys: readonly string[] = DEFAULT_REQUIRED_VALIDATION_KEYS,
  source = 'validations.yml'
): ScalarValidations {
  if (!isMapping(data)) {
    throw new ConfigError(
      ErrorCodes.VALIDATIONS_INVALID,
      `${source} must be a mapping of keys to allowed values`
    );
  }

  const validations = new Map<string, AllowedSet>();
  for (const [key, values] of Object.entries(data)) {
    if (!Array.isArray(values) || values.length === 0) {
      throw new ConfigError(
        ErrorCodes.VALIDATIONS_INVALID,
        `Validation list for '${key}' must be a non-empty list`,
        { key }
      );
    }
    const normalized = new Set(
      values.filter((entry) => entry === null || hasValue(entry)).map(normalizeScalar)
    );
    if (normalized.size === 0) {
      throw new ConfigError(
        ErrorCodes.VALIDATIONS_INVALID,
        `Validation list for '${key}' does not contain usable entries`,
        { key }
      );
    }
    validations.set(key, normalized);
  }

  for (const requiredKey of requiredKeys) {
    if (!validations.has(requiredKey)) {
      throw new ConfigError(
        ErrorCodes.VALIDATIONS_INVALID,
        `${source} must define allowed values for '${requiredKey}'`,
        { key: requiredKey }
      );
    }
  }

  return validations;
}

export function loadValidations(
  validationsPath: string,
  requiredKeys: readonly string[] = DEFAULT_REQUIRED_VALIDATION_KEYS
): ScalarValidations {
  const data = readAllowListFile(validationsPath, 'Validations', ErrorCodes.VALIDATIONS_NOT_FOUND);
  return buildValidations(data, requiredKeys, path.basename(validationsPath));
}
