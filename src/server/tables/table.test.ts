import { describe, expect, it } from 'vitest';
import { ProcessingError } from '../utils/processing-error';
import {
  assertHasRows,
  cellText,
  columnNames,
  createTable,
  findColumn,
  selectRows,
  toRowMatrix,
  uniqueHeaderNames
} from './table';

describe('uniqueHeaderNames', () => {
  it('names blank headers by position and suffixes repeats', () => {
    expect(uniqueHeaderNames(['a', '', 'a', null, 'a', 5])).toEqual([
      'a',
      'Unnamed: 1',
      'a.1',
      'Unnamed: 3',
      'a.2',
      '5'
    ]);
  });
});

describe('createTable', () => {
  it('fixes each column kind from its values', () => {
    const table = createTable(
      ['n', 't', 'mixed', 'empty'],
      [[1, 'x', 1, null], [2, 'y', 'z', null]]
    );

    expect(table.rowCount).toBe(2);
    expect(table.columns.map(c => c.kind)).toEqual(['number', 'text', 'text', 'text']);
    expect(findColumn(table, 'mixed')?.values).toEqual(['1', 'z']);
    expect(findColumn(table, 'empty')?.values).toEqual([null, null]);
  });

  it('parses numeric text and missing tokens when asked', () => {
    const table = createTable(
      ['code', 'amount'],
      [['007', '1.5'], ['8', ' 2e3 '], ['', 'NA']],
      { parseNumericText: true }
    );

    expect(findColumn(table, 'code')).toEqual({ name: 'code', kind: 'number', values: [7, 8, null] });
    expect(findColumn(table, 'amount')).toEqual({ name: 'amount', kind: 'number', values: [1.5, 2000, null] });
  });

  it('keeps the original text of numbers in a text column', () => {
    const table = createTable(['code'], [['007'], ['abc']], { parseNumericText: true });
    expect(findColumn(table, 'code')).toEqual({ name: 'code', kind: 'text', values: ['007', 'abc'] });
  });

  it('keeps integers beyond double precision as their original text', () => {
    const table = createTable(
      ['order_id', 'amount'],
      [['9007199254740992', '1.5'], ['9007199254740993', '9007199254740991']],
      { parseNumericText: true }
    );

    expect(findColumn(table, 'order_id')).toEqual({
      name: 'order_id',
      kind: 'text',
      values: ['9007199254740992', '9007199254740993']
    });
    expect(findColumn(table, 'amount')).toEqual({
      name: 'amount',
      kind: 'number',
      values: [1.5, 9007199254740991]
    });
  });

  it('leaves numeric text alone without the option', () => {
    const table = createTable(['code'], [['1'], ['2']]);
    expect(findColumn(table, 'code')?.kind).toBe('text');
  });

  it('pads short rows and drops extra cells', () => {
    const table = createTable(['a', 'b'], [['1'], ['2', '3', '4']]);

    expect(columnNames(table)).toEqual(['a', 'b']);
    expect(findColumn(table, 'b')?.values).toEqual([null, '3']);
  });

  it('renders dates and booleans as text', () => {
    const table = createTable(
      ['day', 'at', 'flag'],
      [[new Date(Date.UTC(2024, 0, 15)), new Date(Date.UTC(2024, 0, 15, 9, 30)), true]]
    );

    expect(findColumn(table, 'day')?.values).toEqual(['2024-01-15']);
    expect(findColumn(table, 'at')?.values).toEqual(['2024-01-15T09:30:00.000Z']);
    expect(findColumn(table, 'flag')?.values).toEqual(['true']);
  });
});

describe('selectRows', () => {
  it('picks rows in the given order, repeats included', () => {
    const table = createTable(['id', 'qty'], [['a', 1], ['b', 2], ['c', 3]]);
    const selected = selectRows(table, [2, 0, 2]);

    expect(selected.rowCount).toBe(3);
    expect(findColumn(selected, 'id')).toEqual({ name: 'id', kind: 'text', values: ['c', 'a', 'c'] });
    expect(findColumn(selected, 'qty')).toEqual({ name: 'qty', kind: 'number', values: [3, 1, 3] });
  });
});

describe('toRowMatrix', () => {
  it('returns the header followed by each row', () => {
    const table = createTable(['id', 'qty'], [['a', 1], ['b', null]]);
    expect(toRowMatrix(table)).toEqual([['id', 'qty'], ['a', 1], ['b', null]]);
  });
});

describe('cellText', () => {
  it('renders missing cells as empty text', () => {
    expect(cellText(null)).toBe('');
    expect(cellText(2.5)).toBe('2.5');
    expect(cellText(' x ')).toBe(' x ');
  });
});

describe('assertHasRows', () => {
  it('rejects a table without data rows', () => {
    const table = createTable(['id'], []);

    try {
      assertHasRows(table, { file: 'file_a' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ProcessingError);
      if (error instanceof ProcessingError) {
        expect(error.kind).toBe('EmptyInput');
        expect(error.toResponseBody()).toEqual({ error: 'File contains no rows to process.', file: 'file_a' });
      }
    }
  });
});
