import { describe, it, expect } from 'vitest';
import { stringifyCell } from '../../../src/core/conversion/stringify.js';

describe('stringifyCell', () => {
  it('should keep strings verbatim', () => {
    expect(stringifyCell('hello, world')).toBe('hello, world');
    expect(stringifyCell('')).toBe('');
  });

  it('should render numbers and booleans as text', () => {
    expect(stringifyCell(1)).toBe('1');
    expect(stringifyCell(2.5)).toBe('2.5');
    expect(stringifyCell(-0.125)).toBe('-0.125');
    expect(stringifyCell(true)).toBe('true');
    expect(stringifyCell(false)).toBe('false');
  });

  it('should render null and absent values as empty cells', () => {
    expect(stringifyCell(null)).toBe('');
    expect(stringifyCell(undefined)).toBe('');
  });

  it('should render nested values as compact JSON', () => {
    expect(stringifyCell([1, 'a', null])).toBe('[1,"a",null]');
    expect(stringifyCell({ k: { n: true } })).toBe('{"k":{"n":true}}');
  });
});
