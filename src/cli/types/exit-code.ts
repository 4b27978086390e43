import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Typed exit codes for CLI commands.
 * Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - successful execution
  | { kind: 'general_error' }  // 1 - load or conversion failure
  | { kind: 'misuse' };        // 2 - misuse of command (bad args, no source)

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
    default:
      return assertNever(exitCode);
  }
}
