import { formatTimestamp } from '../document/values.js';

/**
 * Canonical string form used for scalar allow-list comparisons.
 *
 *   normalizeScalar(' PROD ') === 'prod'
 *   normalizeScalar(true) === normalizeScalar('True') === 'true'
 *   normalizeScalar(null) === 'null'
 *
 * Labels and resource names are not normalized this way; they compare by
 * trimmed exact match (see normalizeListEntry).
 */
export function normalizeScalar(value: unknown): string {
  if (typeof value === 'string') return value.trim().toLowerCase();
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return formatTimestamp(value);
  return String(value).trim().toLowerCase();
}

/**
 * Case-sensitive form for label and resource-name entries.
 * Returns null for anything that is not a non-blank string.
 */
export function normalizeListEntry(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
