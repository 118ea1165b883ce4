/**
 * Shape guards for parsed YAML values.
 */

/** A parsed YAML mapping. */
export type YamlMapping = Record<string, unknown>;

export function isMapping(value: unknown): value is YamlMapping {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Map) &&
    !(value instanceof Set)
  );
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Text form of a YAML timestamp: `YYYY-MM-DD`, plus ` HH:MM:SS` when it
 * carries a time of day. Timestamps are read as UTC.
 */
export function formatTimestamp(value: Date): string {
  const date = `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
  const h = value.getUTCHours();
  const m = value.getUTCMinutes();
  const s = value.getUTCSeconds();
  if (h === 0 && m === 0 && s === 0) return date;
  return `${date} ${pad(h)}:${pad(m)}:${pad(s)}`;
}

/** True for the collection types a scalar position must not hold. */
export function isCollection(value: unknown): boolean {
  return Array.isArray(value) || value instanceof Set || value instanceof Map || isMapping(value);
}

/**
 * Whether a value counts as "present": not null, non-blank when a string,
 * non-empty when a collection. Numbers and booleans are always present.
 */
export function hasValue(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Set || value instanceof Map) return value.size > 0;
  if (isMapping(value)) return Object.keys(value).length > 0;
  return true;
}
