import { singleton, inject } from 'tsyringe';
import type { Result, ResultAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { Diagnostic, DiagnosticsSink } from '../../core/conversion/diagnostics.js';
import {
  CollectingDiagnosticsSink,
  createLoggerDiagnosticsSink,
  teeDiagnostics,
} from '../../core/conversion/diagnostics.js';
import type { ConversionSummary } from '../../core/conversion/convert.js';
import { convert, inspect } from '../../core/conversion/convert.js';
import type { TableError } from '../../errors/app-error.js';
import type { JsonLoader, JsonSource, LoadOptions } from '../../infrastructure/loading/json-loader.js';
import type { TableFormat, TableRenderer } from '../../infrastructure/rendering/table-renderer.js';

export interface InspectSourceOptions extends LoadOptions {
  /** `null` for the default policy, `0` for unlimited. */
  readonly limit: number | null;
}

export interface RenderSourceOptions extends InspectSourceOptions {
  readonly includeHeader: boolean;
  readonly format: TableFormat;
}

export interface RenderedTable {
  readonly source: string;
  readonly output: string;
  /** Data rows; a header row is not counted. */
  readonly rowCount: number;
  readonly diagnostics: readonly Diagnostic[];
}

export interface InspectedSource extends ConversionSummary {
  readonly source: string;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Load → convert → render.
 *
 * Each call gets its own diagnostics collector; the row-limit notice is
 * logged and also handed back so the CLI can show it.
 */
@singleton()
export class TableService {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Infra.JsonLoader) private readonly loader: JsonLoader,
    @inject(DI.Infra.TableRenderer) private readonly renderer: TableRenderer
  ) {
    this.logger = loggerFactory.create('TableService');
  }

  renderSource(source: JsonSource, options: RenderSourceOptions): ResultAsync<RenderedTable, TableError> {
    const collected = new CollectingDiagnosticsSink();
    const diagnostics = this.sinkWith(collected);

    return this.loader
      .load(source, { baseDir: options.baseDir, encoding: options.encoding })
      .andThen((loaded): Result<RenderedTable, TableError> =>
        convert(loaded.data, {
          includeHeader: options.includeHeader,
          limit: options.limit,
          config: this.config.conversion,
          diagnostics,
        }).map((matrix) => {
          this.logger.debug({ source: loaded.source, rows: matrix.length, format: options.format }, 'Converted JSON');
          return {
            source: loaded.source,
            output: this.renderer.render(matrix, { includeHeader: options.includeHeader, format: options.format }),
            rowCount: options.includeHeader ? Math.max(matrix.length - 1, 0) : matrix.length,
            diagnostics: collected.entries,
          };
        })
      );
  }

  inspectSource(source: JsonSource, options: InspectSourceOptions): ResultAsync<InspectedSource, TableError> {
    const collected = new CollectingDiagnosticsSink();
    const diagnostics = this.sinkWith(collected);

    return this.loader
      .load(source, { baseDir: options.baseDir, encoding: options.encoding })
      .andThen((loaded): Result<InspectedSource, TableError> =>
        inspect(loaded.data, {
          limit: options.limit,
          config: this.config.conversion,
          diagnostics,
        }).map((summary) => ({ ...summary, source: loaded.source, diagnostics: collected.entries }))
      );
  }

  private sinkWith(collected: CollectingDiagnosticsSink): DiagnosticsSink {
    return teeDiagnostics(createLoggerDiagnosticsSink(this.logger), collected);
  }
}
