/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { ConversionConfig } from '../core/conversion/types.js';
import { DEFAULT_CONVERSION_CONFIG } from '../core/conversion/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type BaseDir = Brand<string, 'BaseDir'>;
export type EncodingName = Brand<string, 'EncodingName'>;
export type MaxFileBytes = Brand<number, 'MaxFileBytes'>;

export interface LoaderConfig {
  readonly baseDir: BaseDir;
  readonly encoding: EncodingName;
  readonly maxFileBytes: MaxFileBytes;
}

export interface AppConfig {
  readonly conversion: ConversionConfig;
  readonly loader: LoaderConfig;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
}

export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;
export const DEFAULT_ENCODING = 'utf-8';

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const positiveIntFromEnv = (name: string, fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .positive(`${name} must be positive`)
        .default(fallback)
    );

const EnvSchema = z.object({
  JSONTABLE_MAX_ROWS: positiveIntFromEnv('JSONTABLE_MAX_ROWS', DEFAULT_CONVERSION_CONFIG.defaultCap),
  JSONTABLE_MAX_OBJECTS: positiveIntFromEnv('JSONTABLE_MAX_OBJECTS', DEFAULT_CONVERSION_CONFIG.maxObjects),
  JSONTABLE_MAX_KEYS: positiveIntFromEnv('JSONTABLE_MAX_KEYS', DEFAULT_CONVERSION_CONFIG.maxKeys),
  JSONTABLE_MAX_KEY_LENGTH: positiveIntFromEnv('JSONTABLE_MAX_KEY_LENGTH', DEFAULT_CONVERSION_CONFIG.maxKeyLength),
  JSONTABLE_MAX_FILE_BYTES: positiveIntFromEnv('JSONTABLE_MAX_FILE_BYTES', DEFAULT_MAX_FILE_BYTES),

  JSONTABLE_BASE_DIR: z.string().min(1, 'JSONTABLE_BASE_DIR cannot be empty').optional(),
  JSONTABLE_ENCODING: z.string().min(1, 'JSONTABLE_ENCODING cannot be empty').default(DEFAULT_ENCODING),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, options.cwd)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

/** Config with every default, rooted at `cwd`. */
export function defaultConfig(cwd: string): ValidatedConfig {
  return createValidatedConfig({
    conversion: DEFAULT_CONVERSION_CONFIG,
    loader: {
      baseDir: cwd as BaseDir,
      encoding: DEFAULT_ENCODING as EncodingName,
      maxFileBytes: DEFAULT_MAX_FILE_BYTES as MaxFileBytes,
    },
  });
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, cwd: string): AppConfig {
  return {
    conversion: {
      defaultCap: env.JSONTABLE_MAX_ROWS,
      maxObjects: env.JSONTABLE_MAX_OBJECTS,
      maxKeys: env.JSONTABLE_MAX_KEYS,
      maxKeyLength: env.JSONTABLE_MAX_KEY_LENGTH,
    },
    loader: {
      baseDir: (env.JSONTABLE_BASE_DIR ?? cwd) as BaseDir,
      encoding: env.JSONTABLE_ENCODING as EncodingName,
      maxFileBytes: env.JSONTABLE_MAX_FILE_BYTES as MaxFileBytes,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
