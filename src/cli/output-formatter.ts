/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import { assertNever } from '../runtime/assert-never.js';

type Paint = (text: string) => string;

function section(items: readonly string[] | undefined, paint: Paint, title?: string): string[] {
  if (!items || items.length === 0) return [];
  return ['', ...(title ? [paint(title)] : []), ...items.map((item) => paint(`  • ${item}`))];
}

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const headline = isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`);

  return [
    headline,
    ...section(output.details, chalk.white),
    ...section(output.warnings, chalk.yellow, '⚠️  Warnings:'),
    ...section(output.suggestions, chalk.gray, '💡 Suggestions:'),
  ].join('\n');
}

/**
 * Format the status part of a CliResult. The body is never styled.
 */
export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';
    case 'failure':
      return formatOutput(result.output, true);
    default:
      return assertNever(result);
  }
}

export interface OutputStreams {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export const processStreams: OutputStreams = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Print a CliResult.
 *
 * stdout carries the body when there is one, so status then moves to stderr
 * and `jsontable render data.json > out.txt` stays clean.
 */
export function printResult(result: CliResult, streams: OutputStreams = processStreams): void {
  const formatted = formatResult(result);

  if (result.kind === 'success' && result.body !== undefined) {
    if (result.body !== '') streams.stdout(result.body);
    if (formatted) streams.stderr(formatted);
    return;
  }

  if (!formatted) return;
  if (result.kind === 'failure') {
    streams.stderr(formatted);
  } else {
    streams.stdout(formatted);
  }
}
