import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { LOG_LEVEL_ENV } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSONTABLE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent. Rendered tables own stdout; logs only go to stderr when asked for.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}

export function createRootLogger(level: LogLevel = resolveLogLevel()): Logger {
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // Sync to stderr (fd 2): stdout carries the table
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
