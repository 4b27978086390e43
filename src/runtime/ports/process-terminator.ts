/**
 * Ends the current process. Only composition roots hold one.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
