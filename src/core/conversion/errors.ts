/**
 * Conversion failures.
 *
 * Both are structural: they are decided by the shape classifier before any
 * row exists, and retrying the same input always fails the same way.
 */

import { assertNever } from '../../runtime/assert-never.js';

export type ConversionError = EmptyDataError | InvalidShapeError;

export interface EmptyDataError {
  readonly _tag: 'EmptyData';
  readonly message: string;
}

export interface InvalidShapeError {
  readonly _tag: 'InvalidShape';
  /** What was found where a table source was expected. */
  readonly found: string;
  readonly message: string;
}

export const ConversionErr = {
  emptyData: (): EmptyDataError => ({
    _tag: 'EmptyData',
    message: 'No JSON data to process',
  }),

  topLevelScalar: (found: string): InvalidShapeError => ({
    _tag: 'InvalidShape',
    found,
    message: `JSON data must be an array or object, got ${found}`,
  }),

  nullFirstElement: (): InvalidShapeError => ({
    _tag: 'InvalidShape',
    found: 'null',
    message: 'Invalid array data: null first element',
  }),
} as const;

export function isConversionError(e: unknown): e is ConversionError {
  return (
    typeof e === 'object' &&
    e !== null &&
    '_tag' in e &&
    (e._tag === 'EmptyData' || e._tag === 'InvalidShape')
  );
}

export function formatConversionError(error: ConversionError): string {
  switch (error._tag) {
    case 'EmptyData':
      return error.message;
    case 'InvalidShape':
      return error.message;
    default:
      return assertNever(error);
  }
}
