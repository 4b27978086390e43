/**
 * CLI Result Interpreter
 *
 * Bridges CLI command results to process termination.
 * This is the only place where CliResult is converted to process exit.
 */

import type { CliResult } from './types/index.js';
import { toProcessExitCode } from './types/index.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { OutputStreams } from './output-formatter.js';
import { printResult, processStreams } from './output-formatter.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Print a CLI result, then terminate on failure via the injected terminator.
 */
export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator,
  streams: OutputStreams = processStreams
): void {
  printResult(result, streams);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so stdout drains.
      return;
    case 'failure':
      return terminator.terminate(toProcessExitCode(result.exitCode));
    default:
      assertNever(result);
  }
}
