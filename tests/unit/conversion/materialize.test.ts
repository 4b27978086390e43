import { describe, it, expect } from 'vitest';
import {
  arrayToRow,
  materializeRows,
  objectToRow,
  scalarToRow,
} from '../../../src/core/conversion/materialize.js';

describe('objectToRow', () => {
  it('should align values to the header and blank missing or null keys', () => {
    expect(objectToRow({ b: 3, c: null }, ['a', 'b', 'c'])).toEqual(['', '3', '']);
  });

  it('should not read inherited properties', () => {
    expect(objectToRow({ a: 1 }, ['a', 'toString'])).toEqual(['1', '']);
  });

  it('should put a non-mapping record in the first cell and pad it', () => {
    expect(objectToRow('stray', ['a', 'b', 'c'])).toEqual(['stray', '', '']);
    expect(objectToRow([1, 2], ['a', 'b'])).toEqual(['[1,2]', '']);
  });

  it('should keep one cell for a non-mapping record when the header is empty', () => {
    expect(objectToRow(7, [])).toEqual(['7']);
  });
});

describe('arrayToRow', () => {
  it('should stringify each element', () => {
    expect(arrayToRow([1, 'x', null, true])).toEqual(['1', 'x', '', 'true']);
  });

  it('should turn a non-array element into a one-cell row', () => {
    expect(arrayToRow({ a: 1 })).toEqual(['{"a":1}']);
    expect(arrayToRow(5)).toEqual(['5']);
  });

  it('should turn an empty array into an empty row', () => {
    expect(arrayToRow([])).toEqual([]);
  });
});

describe('scalarToRow', () => {
  it('should produce a single cell', () => {
    expect(scalarToRow(3)).toEqual(['3']);
    expect(scalarToRow(null)).toEqual(['']);
  });
});

describe('materializeRows', () => {
  it('should prepend the header for object rows when requested', () => {
    const matrix = materializeRows({
      mode: { kind: 'object_rows' },
      records: [{ a: 1 }, { a: 2 }],
      headers: ['a'],
      includeHeader: true,
    });
    expect(matrix).toEqual([['a'], ['1'], ['2']]);
  });

  it('should not copy the header array by reference', () => {
    const headers = ['a'];
    const matrix = materializeRows({
      mode: { kind: 'object_rows' },
      records: [{ a: 1 }],
      headers,
      includeHeader: true,
    });
    expect(matrix[0]).not.toBe(headers);
  });

  it('should leave raw rows ragged and never synthesize a header', () => {
    const matrix = materializeRows({
      mode: { kind: 'raw_rows' },
      records: [['h1', 'h2'], [1], [1, 2, 3]],
      headers: [],
      includeHeader: true,
    });
    expect(matrix).toEqual([['h1', 'h2'], ['1'], ['1', '2', '3']]);
  });

  it('should use the Value header for scalar rows', () => {
    const withHeader = materializeRows({
      mode: { kind: 'scalar_rows' },
      records: [1, 'a', false],
      headers: [],
      includeHeader: true,
    });
    const withoutHeader = materializeRows({
      mode: { kind: 'scalar_rows' },
      records: [1, 'a', false],
      headers: [],
      includeHeader: false,
    });

    expect(withHeader).toEqual([['Value'], ['1'], ['a'], ['false']]);
    expect(withoutHeader).toEqual([['1'], ['a'], ['false']]);
  });
});
