export * from './documents.js';
export * from './workbook.js';
