import type { Result } from 'neverthrow';
import type { ArrayMode, ConversionConfig, HeaderSet, JsonValue, RowLimit, TableMatrix } from './types.js';
import { DEFAULT_CONVERSION_CONFIG } from './types.js';
import type { ConversionError } from './errors.js';
import type { DiagnosticsSink } from './diagnostics.js';
import { noopDiagnosticsSink } from './diagnostics.js';
import { classify } from './shape.js';
import { applyRowLimit, resolveRowLimit } from './row-limit.js';
import { extractHeaders } from './headers.js';
import { materializeRows } from './materialize.js';

export interface ConvertOptions {
  readonly includeHeader: boolean;
  /** `null` for the default policy, `0` for unlimited, otherwise a row count. */
  readonly limit: number | null;
  readonly config?: ConversionConfig;
  readonly diagnostics?: DiagnosticsSink;
}

/**
 * Convert a JSON value into a string matrix.
 *
 * Either returns a complete matrix or an error; never a partial table.
 * At most one diagnostic reaches `options.diagnostics`.
 */
export function convert(value: JsonValue, options: ConvertOptions): Result<TableMatrix, ConversionError> {
  const config = options.config ?? DEFAULT_CONVERSION_CONFIG;
  const sink = options.diagnostics ?? noopDiagnosticsSink;

  return classify(value).map((plan) => {
    const { limit, diagnostic } = resolveRowLimit(plan.estimatedSize, options.limit, config.defaultCap);
    if (diagnostic) sink.emit(diagnostic.level, diagnostic.message);

    const records = applyRowLimit(plan.records, limit);
    const headers = plan.mode.kind === 'object_rows' ? extractHeaders(records, config) : [];

    return materializeRows({
      mode: plan.mode,
      records,
      headers,
      includeHeader: options.includeHeader,
    });
  });
}

export interface ConversionSummary {
  readonly mode: ArrayMode;
  readonly estimatedSize: number;
  readonly limit: RowLimit;
  /** Rows `convert` would materialize, header excluded. */
  readonly rowCount: number;
  readonly headers: HeaderSet;
}

/**
 * Everything `convert` decides, without materializing rows.
 * Emits the same diagnostic `convert` would.
 */
export function inspect(
  value: JsonValue,
  options: Omit<ConvertOptions, 'includeHeader'>
): Result<ConversionSummary, ConversionError> {
  const config = options.config ?? DEFAULT_CONVERSION_CONFIG;
  const sink = options.diagnostics ?? noopDiagnosticsSink;

  return classify(value).map((plan) => {
    const { limit, diagnostic } = resolveRowLimit(plan.estimatedSize, options.limit, config.defaultCap);
    if (diagnostic) sink.emit(diagnostic.level, diagnostic.message);

    const records = applyRowLimit(plan.records, limit);
    return {
      mode: plan.mode,
      estimatedSize: plan.estimatedSize,
      limit,
      rowCount: records.length,
      headers: plan.mode.kind === 'object_rows' ? extractHeaders(records, config) : [],
    };
  });
}
