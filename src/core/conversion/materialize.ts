import type { ArrayMode, HeaderSet, JsonArray, JsonValue, TableMatrix } from './types.js';
import { isJsonArray } from './shape.js';
import { isMappingRecord } from './key-filters.js';
import { stringifyCell } from './stringify.js';
import { assertNever } from '../../runtime/assert-never.js';

export const SCALAR_HEADER = 'Value';

/**
 * One object-row record, aligned to the header.
 *
 * A record that is not itself an object keeps its text in the first cell and
 * is padded to the header width.
 */
export function objectToRow(record: JsonValue, headers: HeaderSet): string[] {
  if (!isMappingRecord(record)) {
    const row = [stringifyCell(record)];
    while (row.length < headers.length) row.push('');
    return row;
  }
  return headers.map((key) => (Object.hasOwn(record, key) ? stringifyCell(record[key]) : ''));
}

/** A raw-row element; a non-array element becomes a one-cell row. */
export function arrayToRow(element: JsonValue): string[] {
  if (!isJsonArray(element)) return [stringifyCell(element)];
  return element.map((cell) => stringifyCell(cell));
}

export function scalarToRow(element: JsonValue): string[] {
  return [stringifyCell(element)];
}

export interface MaterializeInput {
  readonly mode: ArrayMode;
  /** Already row-limited. */
  readonly records: JsonArray;
  /** Object rows only. */
  readonly headers: HeaderSet;
  readonly includeHeader: boolean;
}

/**
 * Turn limited records into a fresh matrix.
 *
 * Raw rows never get a synthesized header: with `includeHeader` their first
 * inner array already is the header row.
 */
export function materializeRows(input: MaterializeInput): TableMatrix {
  const { mode, records, headers, includeHeader } = input;
  const matrix: TableMatrix = [];

  switch (mode.kind) {
    case 'object_rows':
      if (includeHeader) matrix.push([...headers]);
      for (const record of records) matrix.push(objectToRow(record, headers));
      return matrix;

    case 'raw_rows':
      for (const element of records) matrix.push(arrayToRow(element));
      return matrix;

    case 'scalar_rows':
      if (includeHeader) matrix.push([SCALAR_HEADER]);
      for (const element of records) matrix.push(scalarToRow(element));
      return matrix;

    default:
      return assertNever(mode);
  }
}
