import type {
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
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

export const LoadErr = {
  sourceMissing: (): SourceMissingError => ({
    _tag: 'SourceMissing',
    message: 'No JSON data source provided',
  }),

  emptyContent: (): EmptyContentError => ({
    _tag: 'EmptyContent',
    message: 'No inline JSON content provided',
  }),

  fileNotFound: (filePath: string): FileNotFoundError => ({
    _tag: 'FileNotFound',
    filePath,
    message: `JSON file not found: ${filePath}`,
  }),

  pathNotAllowed: (filePath: string, baseDir: string): PathNotAllowedError => ({
    _tag: 'PathNotAllowed',
    filePath,
    baseDir,
    message: `Path '${filePath}' is not allowed: it resolves outside ${baseDir}`,
  }),

  fileTooLarge: (filePath: string, sizeBytes: number, maxBytes: number): FileTooLargeError => ({
    _tag: 'FileTooLarge',
    filePath,
    sizeBytes,
    maxBytes,
    message: `File ${filePath} is ${sizeBytes} bytes, above the ${maxBytes} byte limit`,
  }),

  readFailed: (filePath: string, details: string, code?: string): ReadFailedError => ({
    _tag: 'ReadFailed',
    filePath,
    code,
    message: `Failed to read ${filePath}: ${details}`,
  }),

  parseFailed: (source: string, details: string): ParseFailedError => ({
    _tag: 'ParseFailed',
    source,
    details,
    message: source === 'inline'
      ? `Invalid inline JSON: ${details}`
      : `Failed to load ${source}: ${details}`,
  }),
} as const satisfies Record<string, (...args: never[]) => LoadError>;
