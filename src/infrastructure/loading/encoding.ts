import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

export interface ResolvedEncoding {
  /** Canonical WHATWG name, e.g. `utf-8`, `shift_jis`, `windows-1252`. */
  readonly encoding: string;
  /** The requested name was not usable and UTF-8 was substituted. */
  readonly fellBack: boolean;
}

export const FALLBACK_ENCODING = 'utf-8';

/**
 * Map an encoding name to the canonical label a TextDecoder reports for it.
 * `utf8`, `UTF-8` and `unicode-1-1-utf-8` all become `utf-8`. Names that are
 * not text encodings (`hex`, `base64`, typos) fall back to UTF-8.
 */
export function resolveEncoding(name: string | undefined): ResolvedEncoding {
  if (name === undefined) return { encoding: FALLBACK_ENCODING, fellBack: false };

  try {
    return { encoding: new TextDecoder(name.trim().toLowerCase()).encoding, fellBack: false };
  } catch (e) {
    if (e instanceof RangeError) return { encoding: FALLBACK_ENCODING, fellBack: true };
    throw e;
  }
}

/**
 * Decode file bytes strictly. An invalid byte sequence is an error, never a
 * replacement character. A leading byte order mark is dropped.
 */
export function decodeText(bytes: Uint8Array, encoding: string): Result<string, string> {
  try {
    return ok(new TextDecoder(encoding, { fatal: true }).decode(bytes));
  } catch (e) {
    if (e instanceof TypeError) return err(`content is not valid ${encoding}`);
    throw e;
  }
}
