import { Result, ok, err } from 'neverthrow';
import type { ArrayMode, JsonArray, JsonObject, JsonValue } from './types.js';
import type { ConversionError } from './errors.js';
import { ConversionErr } from './errors.js';

/**
 * A classified input: the records to convert, the mode that reads them and
 * the dataset size the row-limit policy sees.
 */
export interface ConversionPlan {
  readonly mode: ArrayMode;
  readonly records: JsonArray;
  readonly estimatedSize: number;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}

/**
 * Pick the array mode from a first element.
 * `null` has no mode; callers turn that into `InvalidShape`.
 */
export function selectArrayMode(first: JsonValue): ArrayMode | null {
  if (first === null) return null;
  if (isJsonArray(first)) return { kind: 'raw_rows' };
  if (isJsonObject(first)) return { kind: 'object_rows' };
  return { kind: 'scalar_rows' };
}

export function classify(value: JsonValue): Result<ConversionPlan, ConversionError> {
  if (value === null) {
    return err(ConversionErr.emptyData());
  }

  if (isJsonArray(value)) {
    if (value.length === 0) {
      return err(ConversionErr.emptyData());
    }
    const mode = selectArrayMode(value[0]);
    if (mode === null) {
      return err(ConversionErr.nullFirstElement());
    }
    return ok({ mode, records: value, estimatedSize: value.length });
  }

  if (isJsonObject(value)) {
    if (Object.keys(value).length === 0) {
      return err(ConversionErr.emptyData());
    }
    return ok({ mode: { kind: 'object_rows' }, records: [value], estimatedSize: 1 });
  }

  return err(ConversionErr.topLevelScalar(typeof value));
}
