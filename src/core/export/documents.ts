/**
 * Loading and cell shaping for the workbook export.
 */
import * as path from 'node:path';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { globFilesSync } from '../../utils/file-system.js';
import { loadYamlSync } from '../../utils/yaml.js';
import { formatTimestamp, isMapping, type YamlMapping } from '../document/values.js';

export type CellValue = string | number | boolean;

const FALSEY_STRINGS = new Set(['false', '0', 'no']);

/**
 * Files matching any of `patterns` inside `wafDir`, deduplicated and sorted
 * by lower-cased file name.
 */
export function discoverExportFiles(wafDir: string, patterns: string[]): string[] {
  const cleaned = patterns.map((p) => p.trim()).filter((p) => p.length > 0);
  const unique = [...new Set(globFilesSync(cleaned, { cwd: wafDir }))];
  return unique.sort((a, b) => {
    const nameA = path.basename(a).toLowerCase();
    const nameB = path.basename(b).toLowerCase();
    return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
  });
}

/** `active: false`, or a string spelling of false, disables an entry. */
export function isFalsey(value: unknown): boolean {
  if (value === false) return true;
  if (typeof value === 'string') return FALSEY_STRINGS.has(value.trim().toLowerCase());
  return false;
}

/**
 * Parse every file and keep the active ones. A file whose root is not a
 * mapping aborts the export.
 */
export function loadActiveDocuments(files: string[]): YamlMapping[] {
  const documents: YamlMapping[] = [];
  for (const file of files) {
    const data = loadYamlSync(file);
    if (!isMapping(data)) {
      throw new ConfigError(
        ErrorCodes.INVALID_DOCUMENT,
        `File ${file} does not contain a top-level mapping`,
        { path: file }
      );
    }
    if (isFalsey(data.active)) continue;
    documents.push({ ...data });
  }
  return documents;
}

/**
 * Union of document keys in first-seen order.
 */
export function collectColumns(documents: YamlMapping[]): string[] {
  const columns = new Set<string>();
  for (const document of documents) {
    for (const key of Object.keys(document)) {
      columns.add(key);
    }
  }
  return [...columns];
}

/**
 * Convert a document value to a cell value.
 * `labels` lists become one label per line; other structures become JSON.
 */
export function serializeValue(value: unknown, column?: string): CellValue {
  if (column === 'labels' && Array.isArray(value)) {
    return value
      .filter((entry): entry is string => typeof entry === 'string' && entry.trim().length > 0)
      .map((entry) => entry.trim())
      .join('\n');
  }
  if (value === null || value === undefined) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return formatTimestamp(value);
  if (Array.isArray(value) && value.length === 0) return '[]';
  if (isMapping(value) && Object.keys(value).length === 0) return '{}';
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/**
 * One row of cell values per document, aligned to `columns`.
 */
export function buildRows(columns: string[], documents: YamlMapping[]): CellValue[][] {
  return documents.map((document) =>
    columns.map((column) => serializeValue(document[column] ?? '', column))
  );
}
