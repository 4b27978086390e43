import { err, errAsync, ok, okAsync, ResultAsync as RA } from 'neverthrow';
import type { Result, ResultAsync } from 'neverthrow';
import type { JsonValue } from '../../core/conversion/types.js';
import type { LoadError } from '../../errors/app-error.js';
import { LoadErr } from '../../errors/factories.js';
import type { Logger } from '../../core/logging/index.js';
import type { LoaderConfig } from '../../config/app-config.js';
import type { FileStat, FsError, LoaderFileSystemPort } from './ports.js';
import { isWithinBase, resolveWithinBase } from './path-security.js';
import { decodeText, resolveEncoding } from './encoding.js';

export const INLINE_SOURCE = 'inline';

export interface JsonSource {
  /** Path relative to the base directory (absolute paths must still fall inside it). */
  readonly file?: string;
  /** Inline JSON text. Ignored when `file` is given. */
  readonly content?: string;
}

export interface LoadOptions {
  readonly baseDir?: string;
  readonly encoding?: string;
}

export interface LoadedJson {
  readonly data: JsonValue;
  /** Resolved file path, or `inline` */
  readonly source: string;
}

export function parseJsonText(text: string, source: string): Result<JsonValue, LoadError> {
  try {
    const data: JsonValue = JSON.parse(text);
    return ok(data);
  } catch (e) {
    return err(LoadErr.parseFailed(source, e instanceof Error ? e.message : String(e)));
  }
}

/**
 * Reads JSON from a file under a base directory or from inline text.
 *
 * Shape is not judged here: a top-level scalar loads fine and is rejected by
 * the converter.
 */
export class JsonLoader {
  constructor(
    private readonly config: LoaderConfig,
    private readonly fs: LoaderFileSystemPort,
    private readonly logger: Logger
  ) {}

  load(source: JsonSource, options: LoadOptions = {}): ResultAsync<LoadedJson, LoadError> {
    if (source.file) {
      return this.loadFromFile(source.file, options);
    }
    if (source.content !== undefined) {
      return new RA(Promise.resolve(this.loadFromContent(source.content)));
    }
    return errAsync(LoadErr.sourceMissing());
  }

  loadFromContent(content: string): Result<LoadedJson, LoadError> {
    if (content.trim() === '') {
      return err(LoadErr.emptyContent());
    }
    return parseJsonText(content, INLINE_SOURCE).map((data) => ({ data, source: INLINE_SOURCE }));
  }

  loadFromFile(file: string, options: LoadOptions = {}): ResultAsync<LoadedJson, LoadError> {
    const baseDir = options.baseDir ?? this.config.baseDir;
    const resolved = resolveWithinBase(baseDir, file);
    if (resolved === null) {
      return errAsync(this.rejectPath(file, baseDir));
    }

    const requested = options.encoding ?? this.config.encoding;
    const { encoding, fellBack } = resolveEncoding(requested);
    if (fellBack) {
      this.logger.warn({ encoding: requested }, `Invalid encoding '${requested}', falling back to UTF-8`);
    }

    return this.resolveReal(resolved, baseDir, file)
      .andThen((real) =>
        this.fs
          .stat(real)
          .mapErr((e) => toLoadError(e, file))
          .andThen((stat): ResultAsync<FileStat, LoadError> => {
            if (!stat.isFile) return errAsync(LoadErr.fileNotFound(file));
            if (stat.sizeBytes > this.config.maxFileBytes) {
              return errAsync(LoadErr.fileTooLarge(file, stat.sizeBytes, this.config.maxFileBytes));
            }
            return okAsync(stat);
          })
          .andThen(() => this.fs.readBytes(real).mapErr((e) => toLoadError(e, file)))
      )
      .andThen((bytes) => decodeText(bytes, encoding).mapErr((details) => LoadErr.parseFailed(file, details)))
      .andThen((text) => parseJsonText(text, file))
      .map((data) => {
        this.logger.debug({ file: resolved, encoding }, 'Loaded JSON file');
        return { data, source: resolved };
      });
  }

  /**
   * Follow symlinks on both sides and confine again: a link inside the base
   * directory may point anywhere.
   */
  private resolveReal(resolved: string, baseDir: string, file: string): ResultAsync<string, LoadError> {
    return this.fs
      .realpath(baseDir)
      .andThen((realBase) => this.fs.realpath(resolved).map((realTarget) => ({ realBase, realTarget })))
      .mapErr((e) => toLoadError(e, file))
      .andThen(({ realBase, realTarget }): ResultAsync<string, LoadError> =>
        isWithinBase(realTarget, realBase) ? okAsync(realTarget) : errAsync(this.rejectPath(file, baseDir))
      );
  }

  private rejectPath(file: string, baseDir: string): LoadError {
    this.logger.warn({ file, baseDir }, 'Rejected path outside base directory');
    return LoadErr.pathNotAllowed(file, baseDir);
  }
}

function toLoadError(e: FsError, file: string): LoadError {
  switch (e.code) {
    case 'FS_NOT_FOUND':
      return LoadErr.fileNotFound(file);
    case 'FS_PERMISSION_DENIED':
      return LoadErr.readFailed(file, 'permission denied', 'EACCES');
    case 'FS_IO_ERROR':
      return LoadErr.readFailed(file, e.message, e.nodeCode);
  }
}
