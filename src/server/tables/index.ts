/**
 * Tables Index
 */

export * from './table';
export { readTable, detectFormat } from './table-reader';
export type { TableFormat } from './table-reader';
export { writeWorkbook, XLSX_CONTENT_TYPE } from './workbook-writer';
export type { NamedSheet } from './workbook-writer';
