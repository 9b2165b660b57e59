import { describe, expect, it } from 'vitest';
import { createTable } from '../tables';
import { ProcessingError } from '../utils/processing-error';
import { composeRowKeys } from './row-key-composer';
import { STRICT_NORMALIZATION } from './key-normalizer';

describe('composeRowKeys', () => {
  it('does not collide across a column boundary', () => {
    const table = createTable(['x', 'y'], [['ab', 'c'], ['a', 'bc']]);
    const [first, second] = composeRowKeys(table, ['x', 'y'], STRICT_NORMALIZATION);
    expect(first).not.toBe(second);
  });

  it('treats rows differing only by case or whitespace as equal under the flags', () => {
    const table = createTable(['name', 'city'], [['Ann  Lee', 'Oslo'], [' ann lee', 'OSLO ']]);

    const strict = composeRowKeys(table, ['name', 'city'], STRICT_NORMALIZATION);
    expect(strict[0]).not.toBe(strict[1]);

    const loose = composeRowKeys(table, ['name', 'city'], { ignoreCase: true, ignoreWhitespace: true });
    expect(loose[0]).toBe(loose[1]);
  });

  it('compares numeric columns by value and renders missing as empty', () => {
    const table = createTable(['qty'], [[1], [1], [null], [2]]);
    const keys = composeRowKeys(table, ['qty'], STRICT_NORMALIZATION);

    expect(keys[0]).toBe(keys[1]);
    expect(keys[2]).toBe('[["number",""]]');
    expect(keys[3]).toBe('[["number","2"]]');
  });

  it('never equates a numeric 1 with a text "1"', () => {
    const numeric = createTable(['v'], [[1]]);
    const text = createTable(['v'], [['1']]);

    const [numericKey] = composeRowKeys(numeric, ['v'], STRICT_NORMALIZATION);
    const [textKey] = composeRowKeys(text, ['v'], STRICT_NORMALIZATION);
    expect(numericKey).not.toBe(textKey);
  });

  it('only reads the selected columns, in the given order', () => {
    const table = createTable(['id', 'a', 'b'], [['1', 'x', 'y'], ['2', 'x', 'y']]);
    const keys = composeRowKeys(table, ['b', 'a'], STRICT_NORMALIZATION);

    expect(keys[0]).toBe(keys[1]);
    expect(keys[0]).toBe('[["text","y"],["text","x"]]');
  });

  it('rejects an empty column list', () => {
    const table = createTable(['id'], [['1']]);
    expect(() => composeRowKeys(table, [], STRICT_NORMALIZATION)).toThrow('No columns left to compare.');
  });

  it('rejects an unknown column with the available names', () => {
    const table = createTable(['id', 'name'], [['1', 'a']]);
    try {
      composeRowKeys(table, ['email'], STRICT_NORMALIZATION);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ProcessingError);
      if (error instanceof ProcessingError) {
        expect(error.kind).toBe('InvalidConfiguration');
        expect(error.context).toEqual({ missing_column: 'email', available_columns: ['id', 'name'] });
      }
    }
  });
});
