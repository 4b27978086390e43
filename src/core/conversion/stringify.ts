import type { JsonValue } from './types.js';

/**
 * Render one cell.
 *
 * `null` and absent values become the empty string; nested arrays and objects
 * become compact JSON text.
 */
export function stringifyCell(value: JsonValue | undefined): string {
  if (value === null || value === undefined) return '';

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
      return String(value);
    default:
      return JSON.stringify(value);
  }
}
