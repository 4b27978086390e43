import type { Logger } from '../logging/index.js';

export type DiagnosticLevel = 'warning' | 'info';

export interface Diagnostic {
  readonly level: DiagnosticLevel;
  readonly message: string;
}

/**
 * Side channel for the row-limit policy. Invoked at most once per conversion.
 *
 * Implementations may be shared by conversions running side by side, so
 * `emit` must not assume a single caller.
 */
export interface DiagnosticsSink {
  emit(level: DiagnosticLevel, message: string): void;
}

export const noopDiagnosticsSink: DiagnosticsSink = {
  emit: () => undefined,
};

/**
 * Keeps every diagnostic it receives, in arrival order.
 */
export class CollectingDiagnosticsSink implements DiagnosticsSink {
  private readonly _entries: Diagnostic[] = [];

  emit(level: DiagnosticLevel, message: string): void {
    this._entries.push({ level, message });
  }

  get entries(): readonly Diagnostic[] {
    return this._entries;
  }

  messages(level?: DiagnosticLevel): string[] {
    return this._entries
      .filter((d) => level === undefined || d.level === level)
      .map((d) => d.message);
  }
}

export function createLoggerDiagnosticsSink(logger: Logger): DiagnosticsSink {
  return {
    emit(level, message) {
      if (level === 'warning') {
        logger.warn(message);
      } else {
        logger.info(message);
      }
    },
  };
}

/** Fans one diagnostic out to several sinks. */
export function teeDiagnostics(...sinks: readonly DiagnosticsSink[]): DiagnosticsSink {
  return {
    emit(level, message) {
      for (const sink of sinks) {
        sink.emit(level, message);
      }
    },
  };
}
