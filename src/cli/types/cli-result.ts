/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these types; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured status output for CLI display.
 * Separates content from presentation.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Result of a CLI command execution.
 *
 * `body` is the command's payload (a rendered table). It goes to stdout
 * verbatim; `output` then goes to stderr.
 */
export type CliResult =
  | { kind: 'success'; body?: string; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput, body?: string): CliResult {
  return { kind: 'success', output, body };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Misuse failure (bad arguments, no input).
 */
export function misuse(
  message: string,
  options?: { details?: readonly string[]; suggestions?: readonly string[] }
): CliResult {
  return failure(message, { ...options, exitCode: { kind: 'misuse' } });
}
