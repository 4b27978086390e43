/**
 * Command option parsing.
 *
 * commander hands over loosely typed values; these schemas are the boundary
 * where they become typed input for the table service.
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { TABLE_FORMATS } from '../../infrastructure/rendering/table-renderer.js';
import type { TableFormat } from '../../infrastructure/rendering/table-renderer.js';
import type { JsonSource } from '../../infrastructure/loading/json-loader.js';

const LimitSchema = z
  .string()
  .regex(/^\d+$/, '--limit must be a non-negative integer')
  .transform(Number)
  .pipe(z.number().max(Number.MAX_SAFE_INTEGER, '--limit is too large'));

const SourceOptionsSchema = z.object({
  inline: z.string().optional(),
  limit: LimitSchema.optional(),
  encoding: z.string().min(1, '--encoding cannot be empty').optional(),
  baseDir: z.string().min(1, '--base-dir cannot be empty').optional(),
});

const RenderOptionsSchema = SourceOptionsSchema.extend({
  header: z.boolean().default(false),
  format: z
    .enum(TABLE_FORMATS, {
      errorMap: () => ({ message: `--format must be one of ${TABLE_FORMATS.join(', ')}` }),
    })
    .default('grid'),
});

export interface SourceArgs {
  readonly source: JsonSource;
  /** `null` when --limit was not given */
  readonly limit: number | null;
  readonly encoding?: string;
  readonly baseDir?: string;
}

export interface RenderArgs extends SourceArgs {
  readonly includeHeader: boolean;
  readonly format: TableFormat;
}

/** Issue messages, one per invalid option. */
export type OptionIssues = readonly string[];

export function parseSourceArgs(file: string | undefined, raw: unknown): Result<SourceArgs, OptionIssues> {
  const parsed = SourceOptionsSchema.safeParse(raw);
  if (!parsed.success) return err(parsed.error.errors.map((i) => i.message));

  return ok(toSourceArgs(file, parsed.data));
}

export function parseRenderArgs(file: string | undefined, raw: unknown): Result<RenderArgs, OptionIssues> {
  const parsed = RenderOptionsSchema.safeParse(raw);
  if (!parsed.success) return err(parsed.error.errors.map((i) => i.message));

  return ok({
    ...toSourceArgs(file, parsed.data),
    includeHeader: parsed.data.header,
    format: parsed.data.format,
  });
}

function toSourceArgs(file: string | undefined, data: z.infer<typeof SourceOptionsSchema>): SourceArgs {
  return {
    source: { file, content: data.inline },
    limit: data.limit ?? null,
    encoding: data.encoding,
    baseDir: data.baseDir,
  };
}
