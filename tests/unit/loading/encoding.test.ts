import { describe, it, expect } from 'vitest';
import { decodeText, resolveEncoding } from '../../../src/infrastructure/loading/encoding.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('resolveEncoding', () => {
  it('should default to UTF-8 without falling back when no name is given', () => {
    expect(resolveEncoding(undefined)).toEqual({ encoding: 'utf-8', fellBack: false });
  });

  it('should normalize aliases to the canonical name', () => {
    expect(resolveEncoding(' UTF-8 ')).toEqual({ encoding: 'utf-8', fellBack: false });
    expect(resolveEncoding('utf8')).toEqual({ encoding: 'utf-8', fellBack: false });
    expect(resolveEncoding('Latin1')).toEqual({ encoding: 'windows-1252', fellBack: false });
  });

  it('should accept legacy text encodings', () => {
    expect(resolveEncoding('Shift_JIS')).toEqual({ encoding: 'shift_jis', fellBack: false });
    expect(resolveEncoding('euc-jp')).toEqual({ encoding: 'euc-jp', fellBack: false });
  });

  it('should fall back to UTF-8 for names that are not text encodings', () => {
    expect(resolveEncoding('hex')).toEqual({ encoding: 'utf-8', fellBack: true });
    expect(resolveEncoding('base64')).toEqual({ encoding: 'utf-8', fellBack: true });
    expect(resolveEncoding('ebcdic')).toEqual({ encoding: 'utf-8', fellBack: true });
    expect(resolveEncoding('')).toEqual({ encoding: 'utf-8', fellBack: true });
  });
});

describe('decodeText', () => {
  it('should decode valid bytes and drop a byte order mark', () => {
    expect(expectOk(decodeText(Uint8Array.from([0xef, 0xbb, 0xbf, 0x5b, 0x5d]), 'utf-8'), 'bom')).toBe('[]');
  });

  it('should reject invalid byte sequences', () => {
    expect(expectErr(decodeText(Uint8Array.from([0xff, 0xfe, 0x41]), 'utf-8'), 'invalid')).toBe(
      'content is not valid utf-8'
    );
  });
});
