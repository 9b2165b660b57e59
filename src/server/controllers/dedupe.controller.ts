/**
 * Dedupe Controller
 *
 * Handles HTTP requests annotating duplicate rows of one uploaded table.
 */

import { Request, Response } from 'express';
import { requestConfig } from '../config';
import { uploadedFile } from '../middleware';
import { dedupeTable, DedupeRequest, DEDUPE_MODES, KEEP_POLICIES } from '../dedupe';
import { assertHasRows, readTable } from '../tables';
import {
  ProcessingError,
  readBooleanField,
  readChoiceField,
  readListField,
  readTextField
} from '../utils';
import { sendWorkbook } from './workbook-response';

/**
 * POST /dedupe
 * Annotate duplicates by key column or by whole row.
 */
export async function dedupeFile(req: Request, res: Response): Promise<void> {
  const request = parseDedupeRequest(req.body);

  const file = uploadedFile(req.file, req.files, 'file');
  if (!file) {
    throw ProcessingError.invalidInput('Missing upload: file.', { field: 'file' });
  }

  const table = readTable(file.buffer, file.originalname);
  assertHasRows(table);

  const annotated = dedupeTable(table, request);

  console.log(
    `[Dedupe] mode=${request.mode} keep=${request.keepPolicy} rows=${annotated.rowCount} ` +
    `file="${file.originalname}"`
  );

  const { tmpDir } = requestConfig(req);
  await sendWorkbook(res, [{ name: 'All_Rows', table: annotated }], 'dedupe_result.xlsx', tmpDir);
}

export function parseDedupeRequest(body: unknown): DedupeRequest {
  const mode = readChoiceField(body, 'mode', DEDUPE_MODES);

  return {
    mode,
    keepPolicy: readChoiceField(body, 'keep_policy', KEEP_POLICIES, 'mark_all'),
    ignoreCase: readBooleanField(body, 'ignore_case', false),
    ignoreWhitespace: readBooleanField(body, 'ignore_whitespace', false),
    keyColumn: mode === 'column' ? readTextField(body, 'key_column') : undefined,
    ignoreColumns: mode === 'row' ? readListField(body, 'ignore_columns') : []
  };
}
