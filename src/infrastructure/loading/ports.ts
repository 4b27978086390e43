import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_IO_ERROR'; readonly message: string; readonly nodeCode?: string };

export interface FileStat {
  readonly isFile: boolean;
  readonly sizeBytes: number;
}

/**
 * The slice of the file system the JSON loader needs.
 * Tests substitute an in-memory implementation.
 */
export interface LoaderFileSystemPort {
  /** Canonical path with every symlink followed. */
  realpath(filePath: string): ResultAsync<string, FsError>;
  stat(filePath: string): ResultAsync<FileStat, FsError>;
  /** Raw bytes; decoding belongs to the loader. */
  readBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
}
