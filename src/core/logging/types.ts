import type { Logger as PinoLogger } from 'pino';

/**
 * pino's Logger, used directly.
 *
 * Data first:
 *   logger.info({ file }, 'Loaded JSON');
 *   logger.error({ err: error }, 'Render failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger bound to `{ component }` */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVEL_ENV = 'JSONTABLE_LOG_LEVEL';
