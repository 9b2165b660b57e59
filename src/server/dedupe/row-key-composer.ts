/**
 * Row Key Composer
 *
 * Builds one composite comparison key per row from several columns.
 * The key is a structural encoding of the ordered (kind, value) tuple, so
 * values can never bleed across a column boundary and a numeric 1 never
 * equals a text "1".
 */

import { cellAt, Column, ColumnKind, columnNames, findColumn, Table } from '../tables';
import { ProcessingError } from '../utils/processing-error';
import { normalizeKeyValue, NormalizationOptions } from './key-normalizer';

type KeyPart = [ColumnKind, string];

export function composeRowKeys(
  table: Table,
  subsetColumns: readonly string[],
  options: NormalizationOptions
): string[] {
  if (subsetColumns.length === 0) {
    throw ProcessingError.invalidConfiguration('No columns left to compare.', {
      available_columns: columnNames(table)
    });
  }

  const columns = subsetColumns.map(name => {
    const column = findColumn(table, name);
    if (!column) {
      throw ProcessingError.invalidConfiguration(`Column '${name}' not found in uploaded file.`, {
        missing_column: name,
        available_columns: columnNames(table)
      });
    }
    return column;
  });

  const keys: string[] = [];
  for (let rowIdx = 0; rowIdx < table.rowCount; rowIdx++) {
    const parts = columns.map((column): KeyPart => [column.kind, keyPart(column, rowIdx, options)]);
    keys.push(JSON.stringify(parts));
  }
  return keys;
}

function keyPart(column: Column, rowIdx: number, options: NormalizationOptions): string {
  const value = cellAt(column, rowIdx);

  if (column.kind === 'number') {
    return value === null ? '' : String(value);
  }

  return normalizeKeyValue(value, options);
}
