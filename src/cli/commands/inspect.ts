/**
 * Inspect Command
 *
 * Reports what `render` would decide (mode, row limit, headers) without
 * materializing any rows.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/index.js';
import { success, misuse } from '../types/index.js';
import type { TableError } from '../../errors/app-error.js';
import type { JsonSource } from '../../infrastructure/loading/json-loader.js';
import type { InspectedSource, InspectSourceOptions } from '../../application/services/table-service.js';
import type { RowLimit } from '../../core/conversion/types.js';
import { assertNever } from '../../runtime/assert-never.js';
import { parseSourceArgs } from './options.js';
import { messagesAt, plural, toFailure } from './render.js';

export interface InspectCommandDeps {
  readonly inspectSource: (source: JsonSource, options: InspectSourceOptions) => ResultAsync<InspectedSource, TableError>;
}

export async function executeInspectCommand(
  file: string | undefined,
  rawOptions: unknown,
  deps: InspectCommandDeps
): Promise<CliResult> {
  const args = parseSourceArgs(file, rawOptions);
  if (args.isErr()) {
    return misuse('Invalid arguments', {
      details: args.error,
      suggestions: ['Run `jsontable inspect --help` for usage'],
    });
  }

  const { source, ...options } = args.value;
  return deps.inspectSource(source, options).match((summary) => {
    const notes = messagesAt(summary.diagnostics, 'info') ?? [];
    return success({
      message: `Inspected ${summary.source}`,
      details: [
        `Mode: ${summary.mode.kind}`,
        `Estimated size: ${plural(summary.estimatedSize, 'record')}`,
        `Row limit: ${describeLimit(summary.limit)}`,
        `Rows: ${summary.rowCount.toLocaleString('en-US')}`,
        `Headers: ${summary.headers.length > 0 ? summary.headers.join(', ') : '(none)'}`,
        ...notes,
      ],
      warnings: messagesAt(summary.diagnostics, 'warning'),
    });
  }, toFailure);
}

export function describeLimit(limit: RowLimit): string {
  switch (limit.kind) {
    case 'unlimited':
      return 'unlimited';
    case 'capped':
      return `first ${limit.maxRows.toLocaleString('en-US')}`;
    default:
      return assertNever(limit);
  }
}
