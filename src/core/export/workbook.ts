/**
 * Workbook export of active WAF documents.
 */
import * as path from 'node:path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { ensureDir, isDirectorySync } from '../../utils/file-system.js';
import type { YamlMapping } from '../document/values.js';
import {
  buildRows,
  collectColumns,
  discoverExportFiles,
  loadActiveDocuments,
} from './documents.js';

export const WORKSHEET_NAME = 'WAF';

export interface ExportOptions {
  /** Absolute directory holding the WAF documents */
  wafDir: string;
  /** Absolute directory that receives the workbook */
  outputDir: string;
  /** Glob patterns, relative to wafDir */
  patterns: string[];
  /** Timestamp for the file name (default: now) */
  now?: Date;
}

export interface ExportResult {
  outputPath: string;
  columns: string[];
  rowCount: number;
  skipped: number;
}

/**
 * Build a single-sheet workbook: a header row of `columns`, then one row per
 * document. The labels column wraps so each label sits on its own line.
 */
export function buildWorkbook(columns: string[], documents: YamlMapping[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(WORKSHEET_NAME);

  sheet.addRow(columns);
  for (const row of buildRows(columns, documents)) {
    sheet.addRow(row);
  }

  const labelsIndex = columns.indexOf('labels');
  if (labelsIndex >= 0) {
    sheet.getColumn(labelsIndex + 1).eachCell({ includeEmpty: true }, (cell) => {
      cell.alignment = { wrapText: true };
    });
  }

  return workbook;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `WAF-version-YYYYMMDD-HHMMSS.xlsx` in local time.
 */
export function workbookFileName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `WAF-version-${date}-${time}.xlsx`;
}

/**
 * Discover, filter and write the workbook. Throws ConfigError when there is
 * nothing to export.
 */
export async function exportWorkbook(options: ExportOptions): Promise<ExportResult> {
  if (!isDirectorySync(options.wafDir)) {
    throw new ConfigError(
      ErrorCodes.WAF_DIR_NOT_FOUND,
      `WAF directory not found: ${options.wafDir}`,
      { path: options.wafDir }
    );
  }

  await ensureDir(options.outputDir);

  const files = discoverExportFiles(options.wafDir, options.patterns);
  if (files.length === 0) {
    throw new ConfigError(
      ErrorCodes.NO_DOCUMENTS,
      `No YAML files found in ${options.wafDir}`,
      { path: options.wafDir }
    );
  }

  const documents = loadActiveDocuments(files);
  if (documents.length === 0) {
    throw new ConfigError(
      ErrorCodes.NO_ACTIVE_DOCUMENTS,
      'No active WAF files to export. All entries have active=false.'
    );
  }

  const columns = collectColumns(documents);
  const workbook = buildWorkbook(columns, documents);
  const outputPath = path.join(options.outputDir, workbookFileName(options.now ?? new Date()));
  await workbook.xlsx.writeFile(outputPath);

  return {
    outputPath,
    columns,
    rowCount: documents.length,
    skipped: files.length - documents.length,
  };
}
