/**
 * Workbook Response
 *
 * Sends tables as an .xlsx download through a request-scoped temp file.
 */

import { Response } from 'express';
import { NamedSheet, writeWorkbook, XLSX_CONTENT_TYPE } from '../tables';
import { removeTempFile, writeTempFile } from '../utils';

export async function sendWorkbook(
  res: Response,
  sheets: readonly NamedSheet[],
  downloadName: string,
  tmpDir: string
): Promise<void> {
  const filePath = await writeTempFile(tmpDir, writeWorkbook(sheets), '.xlsx');

  res.setHeader('Content-Type', XLSX_CONTENT_TYPE);

  await new Promise<void>((resolve, reject) => {
    res.download(filePath, downloadName, err => {
      removeTempFile(filePath);
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
