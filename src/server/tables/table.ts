/**
 * Table Model
 *
 * Structural in-memory table: an ordered list of uniquely named columns,
 * each typed once at construction as either text or number.
 */

import { EMPTY_FILE_MESSAGE, ErrorContext, ProcessingError } from '../utils/processing-error';

export type CellValue = string | number | null;

export type ColumnKind = 'text' | 'number';

export interface TextColumn {
  name: string;
  kind: 'text';
  values: (string | null)[];
}

export interface NumberColumn {
  name: string;
  kind: 'number';
  values: (number | null)[];
}

export type Column = TextColumn | NumberColumn;

export interface Table {
  columns: Column[];
  rowCount: number;
}

export interface CreateTableOptions {
  /** Treat numeric literals in text cells as numbers (CSV input). */
  parseNumericText?: boolean;
}

const NUMERIC_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

const MISSING_TOKENS = new Set(['', 'NA', 'N/A', 'NaN', 'nan', 'null', 'NULL', '#N/A', 'None']);

/**
 * Build a table from a header row and raw data rows.
 * Rows shorter than the header are padded with missing cells, longer rows are cut.
 */
export function createTable(
  header: readonly unknown[],
  rows: readonly (readonly unknown[])[],
  options: CreateTableOptions = {}
): Table {
  const names = uniqueHeaderNames(header);
  const parseNumericText = options.parseNumericText ?? false;

  const columns = names.map((name, colIdx) =>
    buildColumn(name, rows.map(row => toCell(row[colIdx], parseNumericText)))
  );

  return { columns, rowCount: rows.length };
}

/**
 * Stringify header cells and make them unique.
 * Blank headers become `Unnamed: <index>`, repeats get `.1`, `.2`, ...
 */
export function uniqueHeaderNames(header: readonly unknown[]): string[] {
  const seen = new Set<string>();
  const names: string[] = [];

  header.forEach((cell, index) => {
    const raw = cell === null || cell === undefined ? '' : stringifyRaw(cell);
    const base = raw.trim() === '' ? `Unnamed: ${index}` : raw;

    let name = base;
    let suffix = 1;
    while (seen.has(name)) {
      name = `${base}.${suffix++}`;
    }

    seen.add(name);
    names.push(name);
  });

  return names;
}

/**
 * Reject tables without data rows.
 */
export function assertHasRows(table: Table, context?: ErrorContext): void {
  if (table.rowCount === 0) {
    throw ProcessingError.emptyInput(EMPTY_FILE_MESSAGE, context);
  }
}

export function columnNames(table: Table): string[] {
  return table.columns.map(c => c.name);
}

export function findColumn(table: Table, name: string): Column | undefined {
  return table.columns.find(c => c.name === name);
}

export function cellAt(column: Column, rowIdx: number): CellValue {
  return column.values[rowIdx] ?? null;
}

/**
 * Text form of a cell as a user would read it. Missing cells render as ''.
 */
export function cellText(value: CellValue): string {
  if (value === null) return '';
  return typeof value === 'number' ? String(value) : value;
}

export function textColumn(name: string, values: (string | null)[]): TextColumn {
  return { name, kind: 'text', values };
}

export function numberColumn(name: string, values: (number | null)[]): NumberColumn {
  return { name, kind: 'number', values };
}

export function renameColumn(column: Column, name: string): Column {
  return column.kind === 'text'
    ? textColumn(name, column.values)
    : numberColumn(name, column.values);
}

/**
 * New table holding the given rows, in the given order. Indices may repeat.
 */
export function selectRows(table: Table, indices: readonly number[]): Table {
  const columns = table.columns.map((column): Column =>
    column.kind === 'text'
      ? textColumn(column.name, indices.map(i => column.values[i] ?? null))
      : numberColumn(column.name, indices.map(i => column.values[i] ?? null))
  );
  return { columns, rowCount: indices.length };
}

/**
 * Header row followed by one array per data row.
 */
export function toRowMatrix(table: Table): CellValue[][] {
  const matrix: CellValue[][] = [columnNames(table)];
  for (let i = 0; i < table.rowCount; i++) {
    matrix.push(table.columns.map(c => cellAt(c, i)));
  }
  return matrix;
}

// Intermediate cell before the column kind is fixed
type RawCell =
  | { type: 'missing' }
  | { type: 'number'; value: number; source?: string }
  | { type: 'text'; value: string };

function toCell(value: unknown, parseNumericText: boolean): RawCell {
  if (value === null || value === undefined) return { type: 'missing' };

  if (typeof value === 'number') {
    return Number.isFinite(value) ? { type: 'number', value } : { type: 'missing' };
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (MISSING_TOKENS.has(trimmed)) return { type: 'missing' };
    if (parseNumericText && NUMERIC_LITERAL.test(trimmed)) {
      const parsed = Number(trimmed);
      // Integers past 2^53 would round into each other; those stay text
      if (Number.isFinite(parsed) && (!INTEGER_LITERAL.test(trimmed) || Number.isSafeInteger(parsed))) {
        return { type: 'number', value: parsed, source: value };
      }
    }
    return { type: 'text', value };
  }

  return { type: 'text', value: stringifyRaw(value) };
}

function buildColumn(name: string, cells: RawCell[]): Column {
  const present = cells.filter(c => c.type !== 'missing');
  const allNumeric = present.length > 0 && present.every(c => c.type === 'number');

  if (allNumeric) {
    return numberColumn(name, cells.map(c => (c.type === 'number' ? c.value : null)));
  }

  return textColumn(name, cells.map(c => {
    switch (c.type) {
      case 'missing':
        return null;
      case 'number':
        return c.source ?? String(c.value);
      case 'text':
        return c.value;
    }
  }));
}

function stringifyRaw(value: unknown): string {
  if (value instanceof Date) {
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  }
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}
