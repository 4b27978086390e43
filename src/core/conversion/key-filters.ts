/**
 * Skip conditions for header extraction, one predicate per reason so each
 * can be exercised on its own.
 */

import type { JsonObject, JsonValue } from './types.js';
import { isJsonObject } from './shape.js';

/** Non-mapping records contribute no keys. */
export function isMappingRecord(record: JsonValue): record is JsonObject {
  return isJsonObject(record);
}

/** Symbol keys can appear on objects built in code rather than parsed. */
export function isStringKey(key: PropertyKey): key is string {
  return typeof key === 'string';
}

/** The empty-string key never names a column. */
export function isNonEmptyKey(key: string): boolean {
  return key !== '';
}

export function isWithinKeyLength(key: string, maxKeyLength: number): boolean {
  return key.length <= maxKeyLength;
}

export function hasHeaderCapacity(acceptedCount: number, maxKeys: number): boolean {
  return acceptedCount < maxKeys;
}
