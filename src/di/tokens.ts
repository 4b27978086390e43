/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register it in container.ts (factory for undecorated classes)
 * 3. Use @inject(DI.YourToken) on every constructor parameter of consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // APPLICATION SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Load → convert → render orchestration */
    Table: Symbol('Services.Table'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** File system port used by the JSON loader */
    FileSystem: Symbol('Infra.FileSystem'),
    /** JSON loader (file under base dir, or inline text) */
    JsonLoader: Symbol('Infra.JsonLoader'),
    /** Matrix → text table */
    TableRenderer: Symbol('Infra.TableRenderer'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (cli/library/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process termination boundary (exit) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Logger factory (creates component child loggers) */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated application config */
    App: Symbol('Config.App'),
  },
} as const;

