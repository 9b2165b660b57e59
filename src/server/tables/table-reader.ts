/**
 * Table Reader
 *
 * Parses uploaded bytes into a Table, dispatching on the file extension.
 * `.csv` goes through papaparse; everything else is treated as an Excel workbook.
 */

import * as path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { createTable, Table } from './table';
import { INVALID_FILE_MESSAGE, ProcessingError } from '../utils/processing-error';

// Leading bytes of an OOXML (zip) and a legacy OLE2 workbook
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0]);

export type TableFormat = 'csv' | 'excel';

export function detectFormat(fileName: string): TableFormat {
  return path.extname(fileName).toLowerCase() === '.csv' ? 'csv' : 'excel';
}

/**
 * Read an uploaded file into a Table.
 * Parse failures are logged and surfaced as a generic InvalidInput error.
 */
export function readTable(data: Buffer, fileName: string): Table {
  const format = detectFormat(fileName);

  try {
    return format === 'csv' ? readCsv(data) : readWorkbook(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[TableReader] Could not parse ${format} upload "${fileName}": ${reason}`);
    throw ProcessingError.invalidInput(INVALID_FILE_MESSAGE);
  }
}

function readCsv(data: Buffer): Table {
  const text = data.toString('utf-8').replace(/^\uFEFF/, '');

  const result = Papa.parse<string[]>(text, {
    header: false,
    skipEmptyLines: true
  });

  // A single-column file has no delimiter to guess; that is not a failure
  const fatal = result.errors.filter(e => e.type !== 'Delimiter');
  if (fatal.length > 0) {
    throw new Error(`CSV row ${fatal[0].row ?? '?'}: ${fatal[0].message}`);
  }

  const [header, ...rows] = result.data;
  if (!header) {
    throw new Error('CSV has no header row');
  }

  return createTable(header, rows, { parseNumericText: true });
}

function readWorkbook(data: Buffer): Table {
  if (!startsWith(data, ZIP_SIGNATURE) && !startsWith(data, OLE_SIGNATURE)) {
    throw new Error('Not an Excel workbook');
  }

  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  const firstSheetName = workbook.SheetNames[0];
  const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
  if (!sheet) {
    throw new Error('Workbook has no sheets');
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false
  });

  const [header, ...rows] = matrix;
  if (!header) {
    return createTable([], []);
  }

  return createTable(header, rows);
}

function startsWith(data: Buffer, signature: Buffer): boolean {
  return data.length >= signature.length && data.subarray(0, signature.length).equals(signature);
}
