/**
 * Rule tables derived from a WAF check template.
 */

export type RequirementStatus = 'mandatory' | 'optional';

/** Top-level key → status, in template order. */
export type TopLevelRules = ReadonlyMap<string, RequirementStatus>;

/** Parent key → (child key → status) for list- or mapping-valued keys. */
export type NestedRules = ReadonlyMap<string, ReadonlyMap<string, RequirementStatus>>;

export interface TemplateRules {
  topLevel: TopLevelRules;
  nested: NestedRules;
}
