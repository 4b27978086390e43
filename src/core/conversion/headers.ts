import type { ConversionConfig, HeaderSet, JsonArray } from './types.js';
import { hasHeaderCapacity, isMappingRecord, isNonEmptyKey, isStringKey, isWithinKeyLength } from './key-filters.js';

/**
 * Build the column names for object rows.
 *
 * Keys keep the first record's order; keys first seen in later records are
 * appended in the order they appear. Only the first `maxObjects` records are
 * scanned and at most `maxKeys` keys are accepted: once full, later keys are
 * dropped, never rotated in.
 *
 * Within a record, keys follow the runtime's property order: integer-like keys
 * come first in ascending order, then the rest in insertion order. `{"b":1,"2":2}`
 * yields `["2", "b"]`.
 */
export function extractHeaders(
  records: JsonArray,
  config: Pick<ConversionConfig, 'maxObjects' | 'maxKeys' | 'maxKeyLength'>
): HeaderSet {
  const ordered: HeaderSet = [];
  const seen = new Set<string>();
  const scanned = Math.min(records.length, config.maxObjects);

  for (let i = 0; i < scanned; i++) {
    const record = records[i];
    if (!isMappingRecord(record)) continue;

    for (const key of Reflect.ownKeys(record)) {
      if (!hasHeaderCapacity(ordered.length, config.maxKeys)) {
        return ordered;
      }
      if (!isStringKey(key)) continue;
      if (!isNonEmptyKey(key)) continue;
      if (!isWithinKeyLength(key, config.maxKeyLength)) continue;
      if (seen.has(key)) continue;

      seen.add(key);
      ordered.push(key);
    }
  }

  return ordered;
}
