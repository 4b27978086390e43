export type {
  JsonPrimitive,
  JsonObject,
  JsonArray,
  JsonValue,
  ArrayMode,
  RowLimit,
  HeaderSet,
  TableMatrix,
  ConversionConfig,
} from './types.js';
export { DEFAULT_CONVERSION_CONFIG } from './types.js';

export type { ConversionError, EmptyDataError, InvalidShapeError } from './errors.js';
export { ConversionErr, isConversionError, formatConversionError } from './errors.js';

export type { Diagnostic, DiagnosticLevel, DiagnosticsSink } from './diagnostics.js';
export {
  noopDiagnosticsSink,
  CollectingDiagnosticsSink,
  createLoggerDiagnosticsSink,
  teeDiagnostics,
} from './diagnostics.js';

export type { ConversionPlan } from './shape.js';
export { classify, selectArrayMode, isJsonObject, isJsonArray } from './shape.js';
export type { RowLimitResolution } from './row-limit.js';
export { resolveRowLimit, applyRowLimit } from './row-limit.js';
export { extractHeaders } from './headers.js';
export { isMappingRecord, isStringKey, isNonEmptyKey, isWithinKeyLength, hasHeaderCapacity } from './key-filters.js';
export { stringifyCell } from './stringify.js';
export { materializeRows, objectToRow, arrayToRow, scalarToRow, SCALAR_HEADER } from './materialize.js';
export type { MaterializeInput } from './materialize.js';
export type { ConvertOptions, ConversionSummary } from './convert.js';
export { convert, inspect } from './convert.js';
