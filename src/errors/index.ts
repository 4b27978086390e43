export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  UnexpectedError,
  LoadError,
  SourceMissingError,
  EmptyContentError,
  FileNotFoundError,
  PathNotAllowedError,
  FileTooLargeError,
  ReadFailedError,
  ParseFailedError,
  TableError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err, LoadErr } from './factories.js';
export { formatAppError, formatLoadError, formatTableError, suggestionsFor } from './formatter.js';
