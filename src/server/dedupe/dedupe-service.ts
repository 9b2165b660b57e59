/**
 * Dedupe Service
 *
 * Annotates duplicate rows of a single table, either by one key column
 * (column mode) or by every column outside an ignore list (row mode).
 */

import { CellValue, cellText, columnNames, findColumn, Table, textColumn } from '../tables';
import { ProcessingError } from '../utils/processing-error';
import { auditDuplicateGroups, KeepPolicy } from './duplicate-grouping';
import { normalizeKeyValues } from './key-normalizer';
import { composeRowKeys } from './row-key-composer';

export const DEDUPE_MODES = ['column', 'row'] as const;
export type DedupeMode = typeof DEDUPE_MODES[number];

export interface DedupeRequest {
  mode: DedupeMode;
  keepPolicy: KeepPolicy;
  ignoreCase: boolean;
  ignoreWhitespace: boolean;
  /** Required in column mode. */
  keyColumn?: string;
  /** Only used in row mode. */
  ignoreColumns: string[];
}

const ROW_DISPLAY_SEPARATOR = ' | ';

export function dedupeTable(table: Table, request: DedupeRequest): Table {
  const audited = request.mode === 'column'
    ? dedupeByColumn(table, request)
    : dedupeByRow(table, request);

  return {
    rowCount: audited.rowCount,
    columns: [
      textColumn('DuplicateMode', new Array<string>(audited.rowCount).fill(request.mode)),
      ...audited.columns.filter(c => c.name !== 'DuplicateMode')
    ]
  };
}

function dedupeByColumn(table: Table, request: DedupeRequest): Table {
  const keyColumn = request.keyColumn;
  if (!keyColumn) {
    throw ProcessingError.invalidConfiguration("key_column is required when mode is 'column'.", {
      available_columns: columnNames(table)
    });
  }

  const column = findColumn(table, keyColumn);
  if (!column) {
    throw ProcessingError.invalidConfiguration(`Column '${keyColumn}' not found in uploaded file.`, {
      missing_column: keyColumn,
      available_columns: columnNames(table)
    });
  }

  const values: readonly CellValue[] = column.values;
  const groupKeys = normalizeKeyValues(values, request);
  const displayKeys = values.map(cellText);

  return auditDuplicateGroups(table, groupKeys, {
    displayKeys,
    keepPolicy: request.keepPolicy,
    treatBlankAsUnique: true
  });
}

function dedupeByRow(table: Table, request: DedupeRequest): Table {
  // Names absent from the table exclude nothing
  const ignored = new Set(request.ignoreColumns);
  const compared = table.columns.filter(c => !ignored.has(c.name));

  const groupKeys = composeRowKeys(table, compared.map(c => c.name), request);
  const displayKeys: string[] = [];
  for (let rowIdx = 0; rowIdx < table.rowCount; rowIdx++) {
    displayKeys.push(compared.map(c => cellText(c.values[rowIdx] ?? null)).join(ROW_DISPLAY_SEPARATOR));
  }

  return auditDuplicateGroups(table, groupKeys, {
    displayKeys,
    keepPolicy: request.keepPolicy,
    treatBlankAsUnique: false
  });
}
