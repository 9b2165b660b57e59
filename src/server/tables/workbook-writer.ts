/**
 * Workbook Writer
 *
 * Serializes named tables into a single .xlsx workbook.
 */

import * as XLSX from 'xlsx';
import { Table, toRowMatrix } from './table';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface NamedSheet {
  name: string;
  table: Table;
}

export function writeWorkbook(sheets: readonly NamedSheet[]): Buffer {
  const workbook = XLSX.utils.book_new();

  for (const { name, table } of sheets) {
    const worksheet = XLSX.utils.aoa_to_sheet(toRowMatrix(table));
    XLSX.utils.book_append_sheet(workbook, worksheet, name);
  }

  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('Workbook writer did not return a buffer');
  }
  return output;
}
