import { describe, it, expect } from 'vitest';
import { okAsync, errAsync } from 'neverthrow';
import { describeLimit, executeInspectCommand } from '../../../src/cli/commands/inspect.js';
import { LoadErr } from '../../../src/errors/factories.js';

describe('inspect command', () => {
  it('should list what a render would decide', async () => {
    const result = await executeInspectCommand('people.json', { limit: '2' }, {
      inspectSource: () =>
        okAsync({
          source: '/srv/people.json',
          mode: { kind: 'object_rows' },
          estimatedSize: 12_000,
          limit: { kind: 'capped', maxRows: 2 },
          rowCount: 2,
          headers: ['name', 'age'],
          diagnostics: [],
        }),
    });

    expect(result).toEqual({
      kind: 'success',
      body: undefined,
      output: {
        message: 'Inspected /srv/people.json',
        details: [
          'Mode: object_rows',
          'Estimated size: 12,000 records',
          'Row limit: first 2',
          'Rows: 2',
          'Headers: name, age',
        ],
        warnings: undefined,
      },
    });
  });

  it('should append info diagnostics to the details and show headers as none for raw rows', async () => {
    const result = await executeInspectCommand(undefined, { inline: '[[1]]', limit: '0' }, {
      inspectSource: () =>
        okAsync({
          source: 'inline',
          mode: { kind: 'raw_rows' },
          estimatedSize: 1,
          limit: { kind: 'unlimited' },
          rowCount: 1,
          headers: [],
          diagnostics: [{ level: 'info', message: 'Unlimited rows requested via limit 0' }],
        }),
    });

    expect(result.output?.details).toEqual([
      'Mode: raw_rows',
      'Estimated size: 1 record',
      'Row limit: unlimited',
      'Rows: 1',
      'Headers: (none)',
      'Unlimited rows requested via limit 0',
    ]);
  });

  it('should reject a bad limit as misuse', async () => {
    const result = await executeInspectCommand('a.json', { limit: '1.5' }, {
      inspectSource: () => errAsync(LoadErr.sourceMissing()),
    });

    expect(result.kind === 'failure' ? result.exitCode : undefined).toEqual({ kind: 'misuse' });
    expect(result.output?.suggestions).toEqual(['Run `jsontable inspect --help` for usage']);
  });

  it('should report load failures with a general error', async () => {
    const result = await executeInspectCommand('gone.json', {}, {
      inspectSource: () => errAsync(LoadErr.fileNotFound('gone.json')),
    });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: { message: 'JSON file not found: gone.json', details: undefined, suggestions: undefined },
    });
  });
});

describe('describeLimit', () => {
  it('should format capped limits with thousands separators', () => {
    expect(describeLimit({ kind: 'capped', maxRows: 10_000 })).toBe('first 10,000');
    expect(describeLimit({ kind: 'unlimited' })).toBe('unlimited');
  });
});
