import type { Logger } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Logger for code that runs before the DI container exists
 * (composition roots, container initialization).
 *
 * After initialization, inject DI.Logging.Factory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger();
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
