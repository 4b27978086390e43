/**
 * Render Command
 *
 * Converts a JSON file or inline JSON into a text table.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/index.js';
import { success, failure, misuse } from '../types/index.js';
import type { TableError } from '../../errors/app-error.js';
import { formatTableError, suggestionsFor } from '../../errors/formatter.js';
import type { JsonSource } from '../../infrastructure/loading/json-loader.js';
import type { RenderedTable, RenderSourceOptions } from '../../application/services/table-service.js';
import type { Diagnostic } from '../../core/conversion/diagnostics.js';
import { parseRenderArgs } from './options.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RenderCommandDeps {
  readonly renderSource: (source: JsonSource, options: RenderSourceOptions) => ResultAsync<RenderedTable, TableError>;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeRenderCommand(
  file: string | undefined,
  rawOptions: unknown,
  deps: RenderCommandDeps
): Promise<CliResult> {
  const args = parseRenderArgs(file, rawOptions);
  if (args.isErr()) {
    return misuse('Invalid arguments', {
      details: args.error,
      suggestions: ['Run `jsontable render --help` for usage'],
    });
  }

  const { source, ...options } = args.value;
  return deps.renderSource(source, options).match(
    (table) =>
      success(
        {
          message: `Rendered ${plural(table.rowCount, 'row')} from ${table.source}`,
          warnings: messagesAt(table.diagnostics, 'warning'),
          details: messagesAt(table.diagnostics, 'info'),
        },
        table.output
      ),
    toFailure
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// SHARED HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A missing source is a usage problem (exit 2); every other error is a
 * failed run (exit 1).
 */
export function toFailure(error: TableError): CliResult {
  const message = formatTableError(error);
  const suggestions = suggestionsFor(error);

  if (error._tag === 'SourceMissing') {
    return misuse(message, { suggestions });
  }
  return failure(message, { suggestions: suggestions.length > 0 ? suggestions : undefined });
}

export function messagesAt(diagnostics: readonly Diagnostic[], level: Diagnostic['level']): readonly string[] | undefined {
  const messages = diagnostics.filter((d) => d.level === level).map((d) => d.message);
  return messages.length > 0 ? messages : undefined;
}

export function plural(count: number, noun: string): string {
  return `${count.toLocaleString('en-US')} ${noun}${count === 1 ? '' : 's'}`;
}
