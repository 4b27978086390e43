// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVEL_ENV } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory, createRootLogger, resolveLogLevel } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
