import type { Brand } from '../runtime/brand.js';
import type { ConversionError } from '../core/conversion/errors.js';

// ============================================================================
// Configuration / process
// ============================================================================

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | UnexpectedError;

// ============================================================================
// Loading (disk / inline text -> JsonValue)
// ============================================================================

export type SourceMissingError = Readonly<{
  readonly _tag: 'SourceMissing';
  readonly message: string;
}>;

export type EmptyContentError = Readonly<{
  readonly _tag: 'EmptyContent';
  readonly message: string;
}>;

export type FileNotFoundError = Readonly<{
  readonly _tag: 'FileNotFound';
  readonly filePath: string;
  readonly message: string;
}>;

export type PathNotAllowedError = Readonly<{
  readonly _tag: 'PathNotAllowed';
  readonly filePath: string;
  readonly baseDir: string;
  readonly message: string;
}>;

export type FileTooLargeError = Readonly<{
  readonly _tag: 'FileTooLarge';
  readonly filePath: string;
  readonly sizeBytes: number;
  readonly maxBytes: number;
  readonly message: string;
}>;

export type ReadFailedError = Readonly<{
  readonly _tag: 'ReadFailed';
  readonly filePath: string;
  readonly code?: string;
  readonly message: string;
}>;

export type ParseFailedError = Readonly<{
  readonly _tag: 'ParseFailed';
  /** File path, or `inline` */
  readonly source: string;
  readonly details: string;
  readonly message: string;
}>;

export type LoadError =
  | SourceMissingError
  | EmptyContentError
  | FileNotFoundError
  | PathNotAllowedError
  | FileTooLargeError
  | ReadFailedError
  | ParseFailedError;

/** Anything a load -> convert -> render pipeline can fail with. */
export type TableError = LoadError | ConversionError;

/**
 * Branded type for validated config.
 * (Kept here so callers can require a validated version without runtime checks.)
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
