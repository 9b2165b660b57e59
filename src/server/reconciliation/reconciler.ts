/**
 * Reconciler
 *
 * Compares two tables on a shared key column:
 * - matches: inner join (full cross product when a key repeats)
 * - onlyInA / onlyInB: rows whose key never appears on the other side
 *
 * Keys are compared after stripping surrounding whitespace, as text.
 */

import {
  CellValue,
  Column,
  columnNames,
  numberColumn,
  renameColumn,
  selectRows,
  Table,
  textColumn
} from '../tables';
import { normalizeKeyValues, STRICT_NORMALIZATION } from '../dedupe';
import { ProcessingError } from '../utils/processing-error';

export const SUFFIX_A = '_A';
export const SUFFIX_B = '_B';

export interface ReconciliationSummary {
  rowsInA: number;
  rowsInB: number;
  matches: number;
  onlyInA: number;
  onlyInB: number;
}

export interface ReconciliationResult {
  matches: Table;
  onlyInA: Table;
  onlyInB: Table;
  summary: ReconciliationSummary;
}

export function reconcileTables(tableA: Table, tableB: Table, keyColumn: string): ReconciliationResult {
  const keyedA = withNormalizedKey(tableA, keyColumn);
  const keyedB = withNormalizedKey(tableB, keyColumn);

  if (!keyedA || !keyedB) {
    throw ProcessingError.invalidConfiguration(`Column '${keyColumn}' must exist in both files.`, {
      match_column: keyColumn,
      file_a_columns: columnNames(tableA),
      file_b_columns: columnNames(tableB)
    });
  }

  // Row positions in B for every key, in B's order
  const rowsByKeyB = new Map<string, number[]>();
  keyedB.keys.forEach((key, rowIdx) => {
    const rows = rowsByKeyB.get(key);
    if (rows) {
      rows.push(rowIdx);
    } else {
      rowsByKeyB.set(key, [rowIdx]);
    }
  });
  const keysA = new Set(keyedA.keys);

  const pairsA: number[] = [];
  const pairsB: number[] = [];
  const onlyInARows: number[] = [];

  keyedA.keys.forEach((key, rowIdxA) => {
    const matchesB = rowsByKeyB.get(key);
    if (!matchesB) {
      onlyInARows.push(rowIdxA);
      return;
    }
    for (const rowIdxB of matchesB) {
      pairsA.push(rowIdxA);
      pairsB.push(rowIdxB);
    }
  });

  const onlyInBRows: number[] = [];
  keyedB.keys.forEach((key, rowIdxB) => {
    if (!keysA.has(key)) onlyInBRows.push(rowIdxB);
  });

  const matches = joinColumns(
    selectRows(keyedA.table, pairsA),
    selectRows(keyedB.table, pairsB),
    keyColumn
  );
  const onlyInA = selectRows(keyedA.table, onlyInARows);
  const onlyInB = selectRows(keyedB.table, onlyInBRows);

  return {
    matches,
    onlyInA,
    onlyInB,
    summary: {
      rowsInA: tableA.rowCount,
      rowsInB: tableB.rowCount,
      matches: matches.rowCount,
      onlyInA: onlyInA.rowCount,
      onlyInB: onlyInB.rowCount
    }
  };
}

export function summaryToTable(summary: ReconciliationSummary): Table {
  return {
    rowCount: 5,
    columns: [
      textColumn('Metric', ['Rows in File A', 'Rows in File B', 'Matched Rows', 'Only in File A', 'Only in File B']),
      numberColumn('Count', [summary.rowsInA, summary.rowsInB, summary.matches, summary.onlyInA, summary.onlyInB])
    ]
  };
}

interface KeyedTable {
  table: Table;
  keys: string[];
}

/**
 * Replace the key column by its normalized text form. Undefined when the
 * table has no such column.
 */
function withNormalizedKey(table: Table, keyColumn: string): KeyedTable | undefined {
  const column = table.columns.find(c => c.name === keyColumn);
  if (!column) return undefined;

  const values: readonly CellValue[] = column.values;
  const keys = normalizeKeyValues(values, STRICT_NORMALIZATION);

  return {
    keys,
    table: {
      rowCount: table.rowCount,
      columns: table.columns.map(c => (c === column ? textColumn(keyColumn, keys) : c))
    }
  };
}

/**
 * Lay out matched rows: A's columns in place (key once), then B's non-key
 * columns. Shared non-key names are suffixed per side.
 */
function joinColumns(rowsA: Table, rowsB: Table, keyColumn: string): Table {
  const nonKeyA = new Set(rowsA.columns.map(c => c.name).filter(name => name !== keyColumn));
  const nonKeyB = new Set(rowsB.columns.map(c => c.name).filter(name => name !== keyColumn));

  const fromA = rowsA.columns.map(c =>
    c.name !== keyColumn && nonKeyB.has(c.name) ? renameColumn(c, c.name + SUFFIX_A) : c
  );
  const fromB = rowsB.columns
    .filter(c => c.name !== keyColumn)
    .map(c => (nonKeyA.has(c.name) ? renameColumn(c, c.name + SUFFIX_B) : c));

  const columns: Column[] = [...fromA, ...fromB];
  const seen = new Set<string>();
  const conflicting = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) conflicting.add(column.name);
    seen.add(column.name);
  }

  if (conflicting.size > 0) {
    throw ProcessingError.invalidConfiguration('Matched columns collide after adding _A/_B suffixes.', {
      conflicting_columns: [...conflicting]
    });
  }

  return { rowCount: rowsA.rowCount, columns };
}
