#!/usr/bin/env node
/**
 * jsontable CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into output and process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { TableService } from './application/services/table-service.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { TABLE_FORMATS } from './infrastructure/rendering/table-renderer.js';

import { Err } from './errors/factories.js';
import { formatAppError } from './errors/formatter.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { executeRenderCommand, executeInspectCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('jsontable')
  .description('Render JSON files and inline JSON as tables')
  .version('0.3.0');

function withSourceOptions(command: Command): Command {
  return command
    .option('-i, --inline <json>', 'Inline JSON text (ignored when a file is given)')
    .option('-l, --limit <n>', 'Maximum rows to show; 0 shows every row')
    .option('-e, --encoding <name>', 'File encoding (falls back to UTF-8 when unknown)')
    .option('--base-dir <dir>', 'Directory the file must stay inside');
}

async function resolveServices(): Promise<{ terminator: ProcessTerminator; tables: TableService }> {
  await initializeContainer({ runtimeMode: { kind: 'cli' } });
  return {
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    tables: container.resolve<TableService>(DI.Services.Table),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

withSourceOptions(
  program
    .command('render [file]')
    .description('Render a JSON file (or --inline JSON) as a table')
    .option('-H, --header', 'Treat the first row as a header')
    .option('-f, --format <format>', `Output format (${TABLE_FORMATS.join(', ')})`)
).action(async (file: string | undefined, options: unknown) => {
  const { terminator, tables } = await resolveServices();

  const result = await executeRenderCommand(file, options, {
    renderSource: (source, renderOptions) => tables.renderSource(source, renderOptions),
  });

  interpretCliResult(result, terminator);
});

withSourceOptions(
  program
    .command('inspect [file]')
    .description('Show the detected mode, row limit and headers without rendering rows')
).action(async (file: string | undefined, options: unknown) => {
  const { terminator, tables } = await resolveServices();

  const result = await executeInspectCommand(file, options, {
    inspectSource: (source, inspectOptions) => tables.inspectSource(source, inspectOptions),
  });

  interpretCliResult(result, terminator);
});

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  console.error(formatAppError(Err.unexpected('jsontable failed unexpectedly', error)));
  process.exitCode = 1;
});
