/**
 * Allow-list checks layered on top of the template validation.
 */
import { hasValue, isCollection, isMapping } from '../document/values.js';
import { normalizeListEntry, normalizeScalar } from '../allow-lists/normalize.js';
import type { AllowedSet } from '../allow-lists/loaders.js';
import type { DocumentIssues, ValidationContext } from './types.js';
import { validateDocument } from './validator.js';

/**
 * Every entry of a string-list field (labels, epic_resources) must be a
 * non-blank string defined in the allow-list. Comparison is by trimmed
 * exact match.
 */
export function validateStringList(
  fieldName: string,
  value: unknown,
  allowedValues: AllowedSet,
  sourceDescription: string
): string[] {
  if (value === null || value === undefined) {
    return [`Missing or empty mandatory key '${fieldName}'`];
  }
  if (!Array.isArray(value)) {
    return [`Key '${fieldName}' must be a list`];
  }

  const errors: string[] = [];
  value.forEach((entry: unknown, idx) => {
    const normalized = normalizeListEntry(entry);
    if (normalized === null) {
      errors.push(`'${fieldName}' entry ${idx} must be a non-empty string`);
      return;
    }
    if (!allowedValues.has(normalized)) {
      errors.push(
        `'${fieldName}' entry '${normalized}' (index ${idx}) is not defined in ${sourceDescription}`
      );
    }
  });
  return errors;
}

/**
 * A scalar field must normalize to one of its allowed values.
 * Null is left to the mandatory-presence check.
 */
export function validateAllowedValue(key: string, value: unknown, allowedValues: AllowedSet): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (isCollection(value)) {
    return [`Value for '${key}' must be a scalar`];
  }

  if (!allowedValues.has(normalizeScalar(value))) {
    const pretty = [...allowedValues].sort().join(', ');
    return [`Value '${String(value)}' for '${key}' must be one of: ${pretty}`];
  }
  return [];
}

/**
 * Run the template validation and every allow-list check on one document.
 * Errors are ordered: template rules, labels, scalar validations, epic
 * resources.
 */
export function checkDocument(content: unknown, context: ValidationContext): DocumentIssues {
  const { errors, warnings } = validateDocument(content, context.rules);
  if (!isMapping(content)) {
    return { errors, warnings };
  }

  if (hasValue(content.labels)) {
    errors.push(...validateStringList('labels', content.labels, context.labels, context.sources.labels));
  }

  for (const [key, allowed] of context.validations) {
    if (Object.hasOwn(content, key)) {
      errors.push(...validateAllowedValue(key, content[key], allowed));
    }
  }

  if (hasValue(content.epic_resources)) {
    errors.push(
      ...validateStringList(
        'epic_resources',
        content.epic_resources,
        context.epicResources,
        context.sources.epicResources
      )
    );
  }

  return { errors, warnings };
}
