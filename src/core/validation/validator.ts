/**
 * Template-driven validation of a single WAF document.
 *
 * Never throws on document shape: every problem becomes an error or warning
 * message.
 */
import type { NestedRules, RequirementStatus, TemplateRules } from '../template/types.js';
import { hasValue, isMapping, type YamlMapping } from '../document/values.js';
import type { DocumentIssues } from './types.js';

/**
 * Mandatory keys that only warn when missing. Checked inside the mandatory
 * branch, so a key the template marks optional never reaches it.
 */
export const SOFT_WARNING_KEYS: ReadonlySet<string> = new Set(['labels', 'specs', 'epic_resources']);

/**
 * `end_date` may be left blank (absent, null, empty or the text "null")
 * even when mandatory.
 */
export function allowsBlankValue(key: string, value: unknown): boolean {
  if (key !== 'end_date') return false;
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') {
    const stripped = value.trim().toLowerCase();
    return stripped === '' || stripped === 'null';
  }
  return false;
}

function hasOwnValue(mapping: YamlMapping, key: string): boolean {
  return Object.hasOwn(mapping, key) && hasValue(mapping[key]);
}

/**
 * Check the children of a list- or mapping-valued key.
 */
export function validateNested(
  parent: string,
  value: unknown,
  rules: ReadonlyMap<string, RequirementStatus>
): string[] {
  if (value === null || value === undefined) {
    return [`Key '${parent}' must not be empty`];
  }

  const mandatoryKeys = [...rules].filter(([, status]) => status === 'mandatory').map(([key]) => key);

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return [`Key '${parent}' must contain at least one entry`];
    }
    const errors: string[] = [];
    value.forEach((item: unknown, idx) => {
      if (!isMapping(item)) {
        errors.push(`Entry ${idx} under '${parent}' must be an object`);
        return;
      }
      for (const nestedKey of mandatoryKeys) {
        if (!hasOwnValue(item, nestedKey)) {
          errors.push(`Entry ${idx} under '${parent}' is missing mandatory key '${nestedKey}'`);
        }
      }
    });
    return errors;
  }

  if (isMapping(value)) {
    return mandatoryKeys
      .filter((nestedKey) => !hasOwnValue(value, nestedKey))
      .map((nestedKey) => `Key '${parent}' is missing nested key '${nestedKey}'`);
  }

  return [`Key '${parent}' must be a list or mapping`];
}

function runNestedCheck(
  key: string,
  content: Record<string, unknown>,
  nested: NestedRules,
  errors: string[]
): void {
  const rules = nested.get(key);
  if (rules && Object.hasOwn(content, key)) {
    errors.push(...validateNested(key, content[key], rules));
  }
}

/**
 * Apply the template's top-level and nested rules to one parsed document.
 */
export function validateDocument(content: unknown, rules: TemplateRules): DocumentIssues {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isMapping(content)) {
    return { errors: ['Document root must be a mapping'], warnings };
  }

  for (const [key, status] of rules.topLevel) {
    const value = content[key];
    const present = hasOwnValue(content, key);

    if (status === 'mandatory' && !present) {
      if (SOFT_WARNING_KEYS.has(key)) {
        warnings.push(`Optional key '${key}' is missing or empty`);
      } else if (!allowsBlankValue(key, value)) {
        errors.push(`Missing or empty mandatory key '${key}'`);
      }
      continue;
    }

    runNestedCheck(key, content, rules.nested, errors);
  }

  return { errors, warnings };
}
