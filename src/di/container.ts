import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import { assertNever } from '../runtime/assert-never.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import type { LoaderFileSystemPort } from '../infrastructure/loading/ports.js';
import { NodeLoaderFileSystem } from '../infrastructure/loading/node-file-system.js';
import { JsonLoader } from '../infrastructure/loading/json-loader.js';
import { TableRenderer } from '../infrastructure/rendering/table-renderer.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<void> | null = null;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'library' };
}

function terminatorFor(mode: RuntimeMode): ProcessTerminator {
  switch (mode.kind) {
    case 'test':
      return new ThrowingProcessTerminator();
    case 'cli':
    case 'library':
      return new NodeProcessTerminator();
    default:
      return assertNever(mode);
  }
}

function registerRuntime(options: ContainerInitOptions): void {
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: options.runtimeMode ?? detectRuntimeMode() });

  // Tests may supply their own terminator.
  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, {
      useFactory: instanceCachingFactory((c) => terminatorFor(c.resolve<RuntimeMode>(DI.Runtime.Mode))),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Tests inject config explicitly before initialization.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env, cwd: process.cwd() });
  if (configResult.isErr()) {
    console.error(formatAppError(configResult.error));
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    return terminator.terminate({ kind: 'failure' });
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerInfrastructure(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register<LoaderFileSystemPort>(DI.Infra.FileSystem, {
      useFactory: instanceCachingFactory(() => new NodeLoaderFileSystem()),
    });
  }

  container.register(DI.Infra.JsonLoader, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      const fs = c.resolve<LoaderFileSystemPort>(DI.Infra.FileSystem);
      const logger = c.resolve<ILoggerFactory>(DI.Logging.Factory).create('JsonLoader');
      return new JsonLoader(config.loader, fs, logger);
    }),
  });

  container.register(DI.Infra.TableRenderer, {
    useFactory: instanceCachingFactory(() => new TableRenderer()),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

async function registerServices(): Promise<void> {
  // Loaded after reflect-metadata; @singleton() registers the class itself.
  const { TableService } = await import('../application/services/table-service.js');

  container.register(DI.Services.Table, {
    useFactory: instanceCachingFactory((c) => c.resolve(TableService)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Idempotent: concurrent and repeated calls share one initialization.
 * A failed initialization is not retried; the caller should exit.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return Promise.resolve();
  if (initializationPromise) return initializationPromise;

  initializationPromise = (async () => {
    try {
      registerRuntime(options);
      registerConfig();
      registerInfrastructure();
      await registerServices();
      initialized = true;
      createBootstrapLogger('DI').debug('Container initialized');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`[DI] Container initialization failed: ${message}`);
    }
  })();

  return initializationPromise;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
