import type { RowLimit } from './types.js';
import type { Diagnostic } from './diagnostics.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface RowLimitResolution {
  readonly limit: RowLimit;
  readonly diagnostic?: Diagnostic;
}

const UNLIMITED: RowLimit = { kind: 'unlimited' };

const formatCount = (n: number): string => n.toLocaleString('en-US');

/**
 * Resolve how many rows a conversion materializes.
 *
 * - `0` lifts every cap and says so (info).
 * - A positive limit is taken verbatim, even when larger than the dataset.
 * - No limit caps at `defaultCap` only when the dataset is strictly larger,
 *   with a warning naming both numbers.
 *
 * @param userLimit `null`, `0` or a positive integer
 */
export function resolveRowLimit(
  estimatedSize: number,
  userLimit: number | null,
  defaultCap: number
): RowLimitResolution {
  if (userLimit === 0) {
    return {
      limit: UNLIMITED,
      diagnostic: { level: 'info', message: 'Unlimited rows requested via limit 0' },
    };
  }

  if (userLimit !== null) {
    if (!Number.isSafeInteger(userLimit) || userLimit < 0) {
      throw new RangeError(`Row limit must be null or a non-negative integer, got ${userLimit}`);
    }
    return { limit: { kind: 'capped', maxRows: userLimit } };
  }

  if (estimatedSize > defaultCap) {
    return {
      limit: { kind: 'capped', maxRows: defaultCap },
      diagnostic: {
        level: 'warning',
        message:
          `Large dataset detected (${formatCount(estimatedSize)} rows). ` +
          `Showing first ${formatCount(defaultCap)} rows for performance. ` +
          'Use the limit option to customize (e.g. limit 0 for all rows).',
      },
    };
  }

  return { limit: UNLIMITED };
}

export function applyRowLimit<T>(records: readonly T[], limit: RowLimit): readonly T[] {
  switch (limit.kind) {
    case 'unlimited':
      return records;
    case 'capped':
      return records.slice(0, limit.maxRows);
    default:
      return assertNever(limit);
  }
}
