import * as fs from 'fs/promises';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { FileStat, FsError, LoaderFileSystemPort } from './ports.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return {
    code: 'FS_IO_ERROR',
    message: e instanceof Error ? e.message : String(e),
    nodeCode: code,
  };
}

export class NodeLoaderFileSystem implements LoaderFileSystemPort {
  realpath(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.realpath(filePath), (e) => mapFsError(e, filePath));
  }

  stat(filePath: string): ResultAsync<FileStat, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((s) => ({
      isFile: s.isFile(),
      sizeBytes: s.size,
    }));
  }

  readBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(fs.readFile(filePath), (e) => mapFsError(e, filePath));
  }
}
