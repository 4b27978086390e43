import { describe, it, expect, beforeEach } from 'vitest';
import path from 'path';
import { JsonLoader, parseJsonText } from '../../../src/infrastructure/loading/json-loader.js';
import { loadConfig } from '../../../src/config/app-config.js';
import type { LoaderConfig } from '../../../src/config/app-config.js';
import { InMemoryFileSystem } from '../../fakes/in-memory-file-system.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const BASE = path.resolve('/srv/tables');

function loaderConfig(env: Record<string, string> = {}): LoaderConfig {
  return expectOk(loadConfig({ env, cwd: BASE }), 'loader config').loader;
}

describe('JsonLoader', () => {
  let fs: InMemoryFileSystem;
  let loggers: FakeLoggerFactory;
  let loader: JsonLoader;

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    loggers = new FakeLoggerFactory();
    loader = new JsonLoader(loaderConfig(), fs, loggers.create('JsonLoader'));
  });

  describe('inline content', () => {
    it('should parse inline JSON', async () => {
      const loaded = expectOk(await loader.load({ content: '[{"a":1}]' }), 'inline');
      expect(loaded).toEqual({ data: [{ a: 1 }], source: 'inline' });
    });

    it('should reject blank content', async () => {
      const error = expectErr(await loader.load({ content: '   \n' }), 'blank inline');
      expect(error).toEqual({ _tag: 'EmptyContent', message: 'No inline JSON content provided' });
    });

    it('should load scalars without judging the shape', async () => {
      expect(expectOk(await loader.load({ content: '"text"' }), 'scalar').data).toBe('text');
    });

    it('should report invalid inline JSON as a parse failure', async () => {
      const error = expectErr(await loader.load({ content: '{oops' }), 'bad inline');
      expect(error._tag).toBe('ParseFailed');
      expect(error.message.startsWith('Invalid inline JSON: ')).toBe(true);
    });
  });

  describe('source selection', () => {
    it('should fail with SourceMissing when neither file nor content is given', async () => {
      const error = expectErr(await loader.load({}), 'no source');
      expect(error).toEqual({ _tag: 'SourceMissing', message: 'No JSON data source provided' });
    });

    it('should prefer the file over inline content', async () => {
      fs.addFile(path.join(BASE, 'data.json'), '[1]');
      const loaded = expectOk(await loader.load({ file: 'data.json', content: '[2]' }), 'file wins');
      expect(loaded).toEqual({ data: [1], source: path.join(BASE, 'data.json') });
    });
  });

  describe('files', () => {
    it('should read a nested file under the base directory', async () => {
      fs.addFile(path.join(BASE, 'nested', 'rows.json'), '{"x":"y"}');

      const loaded = expectOk(await loader.load({ file: 'nested/rows.json' }), 'nested file');

      expect(loaded.data).toEqual({ x: 'y' });
      expect(fs.reads).toEqual([path.join(BASE, 'nested', 'rows.json')]);
    });

    it('should reject paths that escape the base directory', async () => {
      const error = expectErr(await loader.load({ file: '../secrets.json' }), 'traversal');

      expect(error).toEqual({
        _tag: 'PathNotAllowed',
        filePath: '../secrets.json',
        baseDir: BASE,
        message: `Path '../secrets.json' is not allowed: it resolves outside ${BASE}`,
      });
      expect(fs.reads).toEqual([]);
      expect(loggers.getLogger('JsonLoader')?.hasEntry('warn', 'Rejected path outside base directory')).toBe(true);
    });

    it('should reject a symlink that leads outside the base directory', async () => {
      const outside = path.resolve('/srv/secret.json');
      fs.addFile(outside, '[{"secret":"leaked"}]');
      fs.addSymlink(path.join(BASE, 'link.json'), outside);

      const error = expectErr(await loader.load({ file: 'link.json' }), 'escaping link');

      expect(error).toEqual({
        _tag: 'PathNotAllowed',
        filePath: 'link.json',
        baseDir: BASE,
        message: `Path 'link.json' is not allowed: it resolves outside ${BASE}`,
      });
      expect(fs.reads).toEqual([]);
    });

    it('should follow a symlink that stays inside the base directory', async () => {
      const target = path.join(BASE, 'data', 'rows.json');
      fs.addFile(target, '[1]');
      fs.addSymlink(path.join(BASE, 'latest.json'), target);

      const loaded = expectOk(await loader.load({ file: 'latest.json' }), 'inside link');

      expect(loaded).toEqual({ data: [1], source: path.join(BASE, 'latest.json') });
      expect(fs.reads).toEqual([target]);
    });

    it('should honor a per-call base directory', async () => {
      const other = path.resolve('/srv/other');
      fs.addFile(path.join(other, 'a.json'), '[true]');

      const loaded = expectOk(await loader.load({ file: 'a.json' }, { baseDir: other }), 'base dir override');
      expect(loaded.data).toEqual([true]);
    });

    it('should report a missing file', async () => {
      const error = expectErr(await loader.load({ file: 'missing.json' }), 'missing');
      expect(error).toEqual({
        _tag: 'FileNotFound',
        filePath: 'missing.json',
        message: 'JSON file not found: missing.json',
      });
    });

    it('should treat a directory as not found', async () => {
      fs.addDirectory(path.join(BASE, 'dir.json'));
      expect(expectErr(await loader.load({ file: 'dir.json' }), 'directory')._tag).toBe('FileNotFound');
    });

    it('should refuse files above the size cap before reading them', async () => {
      const small = new JsonLoader(
        loaderConfig({ JSONTABLE_MAX_FILE_BYTES: '8' }),
        fs,
        loggers.create('JsonLoader')
      );
      fs.addFile(path.join(BASE, 'big.json'), '[1,2,3,4,5]');

      const error = expectErr(await small.load({ file: 'big.json' }), 'too large');

      expect(error).toEqual({
        _tag: 'FileTooLarge',
        filePath: 'big.json',
        sizeBytes: 11,
        maxBytes: 8,
        message: 'File big.json is 11 bytes, above the 8 byte limit',
      });
      expect(fs.reads).toEqual([]);
    });

    it('should map permission errors to ReadFailed', async () => {
      fs.failWith(path.join(BASE, 'locked.json'), { code: 'FS_PERMISSION_DENIED', message: 'denied' });

      const error = expectErr(await loader.load({ file: 'locked.json' }), 'permission');
      expect(error).toEqual({
        _tag: 'ReadFailed',
        filePath: 'locked.json',
        code: 'EACCES',
        message: 'Failed to read locked.json: permission denied',
      });
    });

    it('should report invalid file JSON with the file name', async () => {
      fs.addFile(path.join(BASE, 'bad.json'), '[1,');

      const error = expectErr(await loader.load({ file: 'bad.json' }), 'bad file');
      expect(error._tag).toBe('ParseFailed');
      expect(error.message.startsWith('Failed to load bad.json: ')).toBe(true);
    });
  });

  describe('encodings', () => {
    it('should decode with a per-call encoding', async () => {
      fs.addBytes(path.join(BASE, 'a.json'), Uint8Array.from([0x5b, 0x22, 0xe9, 0x22, 0x5d]));

      const loaded = expectOk(await loader.load({ file: 'a.json' }, { encoding: 'Latin1' }), 'latin1');
      expect(loaded.data).toEqual(['é']);
    });

    it('should decode Shift_JIS files', async () => {
      // [{"名前":1}]
      const bytes = [0x5b, 0x7b, 0x22, 0x96, 0xbc, 0x91, 0x4f, 0x22, 0x3a, 0x31, 0x7d, 0x5d];
      fs.addBytes(path.join(BASE, 'names.json'), Uint8Array.from(bytes));

      const loaded = expectOk(await loader.load({ file: 'names.json' }, { encoding: 'shift_jis' }), 'sjis');
      expect(loaded.data).toEqual([{ 名前: 1 }]);
    });

    it('should fail on bytes that are invalid in the encoding', async () => {
      fs.addBytes(path.join(BASE, 'broken.json'), Uint8Array.from([0x5b, 0x22, 0xff, 0xfe, 0x22, 0x5d]));

      const error = expectErr(await loader.load({ file: 'broken.json' }), 'invalid utf-8');

      expect(error).toEqual({
        _tag: 'ParseFailed',
        source: 'broken.json',
        details: 'content is not valid utf-8',
        message: 'Failed to load broken.json: content is not valid utf-8',
      });
    });

    it('should fall back to UTF-8 for an unknown encoding and warn once', async () => {
      fs.addFile(path.join(BASE, 'a.json'), '["ü"]');

      const loaded = expectOk(await loader.load({ file: 'a.json' }, { encoding: 'klingon' }), 'unknown encoding');

      expect(loaded.data).toEqual(['ü']);
      const warnings = loggers.getLogger('JsonLoader')?.getEntries('warn') ?? [];
      expect(warnings.map((e) => e.msg)).toEqual(["Invalid encoding 'klingon', falling back to UTF-8"]);
    });
  });
});

describe('parseJsonText', () => {
  it('should parse valid JSON and tag failures with the source', () => {
    expect(expectOk(parseJsonText('{"a":[1]}', 'x.json'), 'valid')).toEqual({ a: [1] });
    expect(expectErr(parseJsonText('', 'x.json'), 'empty')).toMatchObject({ _tag: 'ParseFailed', source: 'x.json' });
  });
});
