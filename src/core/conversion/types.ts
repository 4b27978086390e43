/**
 * Conversion engine types.
 *
 * Everything here is created at the start of one `convert()` call and
 * discarded at its end. Nothing is cached between calls.
 */

export type JsonPrimitive = string | number | boolean | null;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

export type JsonArray = readonly JsonValue[];

/** Untrusted, externally owned input. Never mutated by the engine. */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * How the elements of a top-level array are interpreted.
 * Chosen once, from the first element, and fixed for the whole conversion.
 */
export type ArrayMode =
  | { readonly kind: 'object_rows' }
  | { readonly kind: 'raw_rows' }
  | { readonly kind: 'scalar_rows' };

export type RowLimit =
  | { readonly kind: 'unlimited' }
  | { readonly kind: 'capped'; readonly maxRows: number };

/** Ordered, deduplicated column names. */
export type HeaderSet = string[];

/** Optional header row followed by data rows. */
export type TableMatrix = string[][];

export interface ConversionConfig {
  /** Rows materialized when no explicit limit is given and the dataset is larger. */
  readonly defaultCap: number;
  /** Records scanned for header keys. */
  readonly maxObjects: number;
  /** Unique header keys accepted. */
  readonly maxKeys: number;
  /** Longest header key accepted, inclusive. */
  readonly maxKeyLength: number;
}

export const DEFAULT_CONVERSION_CONFIG: ConversionConfig = {
  defaultCap: 10_000,
  maxObjects: 10_000,
  maxKeys: 1_000,
  maxKeyLength: 255,
};
