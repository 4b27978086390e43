// Conversion engine (pure, no I/O)
export * from './core/conversion/index.js';

// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export { DI } from './di/tokens.js';

// Services
export { TableService } from './application/services/table-service.js';
export type {
  RenderSourceOptions,
  InspectSourceOptions,
  RenderedTable,
  InspectedSource,
} from './application/services/table-service.js';

// Infrastructure
export { JsonLoader, INLINE_SOURCE, parseJsonText } from './infrastructure/loading/json-loader.js';
export type { JsonSource, LoadOptions, LoadedJson } from './infrastructure/loading/json-loader.js';
export { NodeLoaderFileSystem } from './infrastructure/loading/node-file-system.js';
export type { LoaderFileSystemPort, FsError, FileStat } from './infrastructure/loading/ports.js';
export { TableRenderer, TABLE_FORMATS, padRows } from './infrastructure/rendering/table-renderer.js';
export type { TableFormat, RenderOptions } from './infrastructure/rendering/table-renderer.js';

// Config and errors
export { loadConfig, createValidatedConfig, defaultConfig } from './config/app-config.js';
export type { AppConfig, LoaderConfig, ValidatedConfig } from './config/app-config.js';
export * from './errors/index.js';
