/**
 * How the current process was started. Injected, not sniffed from env in services.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'library' }
  | { kind: 'test' };
