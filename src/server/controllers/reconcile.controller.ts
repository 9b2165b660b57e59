/**
 * Reconcile Controller
 *
 * Handles HTTP requests comparing two uploaded tables on a key column.
 */

import { Request, Response } from 'express';
import { requestConfig } from '../config';
import { uploadedFile } from '../middleware';
import { reconcileTables, summaryToTable } from '../reconciliation';
import { assertHasRows, readTable, Table } from '../tables';
import { ProcessingError, readTextField } from '../utils';
import { sendWorkbook } from './workbook-response';

const FILE_FIELDS = ['file_a', 'file_b'] as const;
type FileField = typeof FILE_FIELDS[number];

/**
 * POST /process
 * Reconcile file_a against file_b on match_column.
 */
export async function processFiles(req: Request, res: Response): Promise<void> {
  const matchColumn = readTextField(req.body, 'match_column');

  const [tableA, tableB] = FILE_FIELDS.map(field => readUpload(req, field));

  if (!matchColumn) {
    throw ProcessingError.invalidConfiguration('match_column is required.', {
      field: 'match_column'
    });
  }

  const result = reconcileTables(tableA, tableB, matchColumn);
  const { summary } = result;

  console.log(
    `[Reconcile] key=${matchColumn} A=${summary.rowsInA} B=${summary.rowsInB} ` +
    `matched=${summary.matches} onlyA=${summary.onlyInA} onlyB=${summary.onlyInB}`
  );

  await sendWorkbook(res, [
    { name: 'Matches', table: result.matches },
    { name: 'Only_in_File_A', table: result.onlyInA },
    { name: 'Only_in_File_B', table: result.onlyInB },
    { name: 'Summary', table: summaryToTable(summary) }
  ], 'reconciliation_result.xlsx', requestConfig(req).tmpDir);
}

function readUpload(req: Request, field: FileField): Table {
  const file = uploadedFile(req.file, req.files, field);
  if (!file) {
    throw ProcessingError.invalidInput(`Missing upload: ${field}.`, { field });
  }

  const table = readTable(file.buffer, file.originalname);
  assertHasRows(table, { file: field });
  return table;
}
