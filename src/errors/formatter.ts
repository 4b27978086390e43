import type { AppError, LoadError, TableError } from './app-error.js';
import { formatConversionError } from '../core/conversion/errors.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

export function formatLoadError(error: LoadError): string {
  switch (error._tag) {
    case 'SourceMissing':
    case 'EmptyContent':
    case 'FileNotFound':
    case 'PathNotAllowed':
    case 'FileTooLarge':
    case 'ReadFailed':
    case 'ParseFailed':
      return error.message;
    default:
      return assertNever(error);
  }
}

export function formatTableError(error: TableError): string {
  switch (error._tag) {
    case 'EmptyData':
    case 'InvalidShape':
      return formatConversionError(error);
    default:
      return formatLoadError(error);
  }
}

/** Suggestions shown under a failed CLI command. */
export function suggestionsFor(error: TableError): readonly string[] {
  switch (error._tag) {
    case 'SourceMissing':
      return ['Pass a file path or --inline <json>'];
    case 'PathNotAllowed':
      return ['Keep the file under the base directory, or pass --base-dir'];
    case 'FileTooLarge':
      return ['Raise JSONTABLE_MAX_FILE_BYTES if the file is trusted'];
    case 'ParseFailed':
      return ['Check the JSON syntax and try again'];
    case 'InvalidShape':
      return ['Use an object, or an array of objects, arrays or scalars'];
    case 'EmptyContent':
    case 'FileNotFound':
    case 'ReadFailed':
    case 'EmptyData':
      return [];
    default:
      return assertNever(error);
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
