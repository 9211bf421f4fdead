import { z } from 'zod';
import type { EntryFilter } from '@shardkit/core';

/** Title marker of disambiguation pages per archive language. */
export const DISAMBIGUATION_PATTERNS = {
  en: '(disambiguation)',
  hu: '(egyértelműsítő lap)',
} as const;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LanguageSchema = z.enum(['en', 'hu']);

const positiveInteger = z.coerce.number().int().positive();

const ExtractOptionsSchema = z
  .object({
    inputFile: z.string().min(1),
    outputDir: z.string().min(1),
    language: LanguageSchema.default('hu'),
    documents: positiveInteger.default(2500),
    zeroes: positiveInteger.default(4),
    threads: positiveInteger.default(10),
    namespace: z.string().min(1).default('A'),
    excludePattern: z.string().min(1).optional(),
    compressionLevel: z.coerce.number().int().min(0).max(9).optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .transform((options, ctx) => {
    let excludeTitle: string | RegExp = DISAMBIGUATION_PATTERNS[options.language];
    if (options.excludePattern !== undefined) {
      try {
        excludeTitle = new RegExp(options.excludePattern, 'u');
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['excludePattern'],
          message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
        });
        return z.NEVER;
      }
    }
    return { ...options, excludeTitle };
  });

const EnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.optional(),
});

/** Validated settings of the `extract` command. */
export interface ExtractConfig {
  readonly inputFile: string;
  readonly outputDir: string;
  readonly documentsPerShard: number;
  readonly threadCount: number;
  readonly zeroPadding: number;
  readonly filter: EntryFilter;
  readonly compressionLevel?: number;
  readonly logLevel: LogLevel;
}

/** Invalid command line options or environment. */
export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(
    error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
  );
}

/** Log level from the `LOG_LEVEL` environment variable, `info` when unset. */
export function resolveLogLevel(env: Readonly<Record<string, string | undefined>>): LogLevel {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw toConfigError(parsed.error);
  return parsed.data.LOG_LEVEL ?? 'info';
}

/**
 * Validate raw `extract` options (strings as commander hands them over).
 *
 * The language selects the disambiguation marker excluded by substring match;
 * `excludePattern` replaces it with a regular expression.
 *
 * @throws ConfigError listing every invalid option.
 */
export function parseExtractConfig(
  raw: Record<string, unknown>,
  env: Readonly<Record<string, string | undefined>> = {},
): ExtractConfig {
  const parsed = ExtractOptionsSchema.safeParse(raw);
  if (!parsed.success) throw toConfigError(parsed.error);
  const options = parsed.data;

  return {
    inputFile: options.inputFile,
    outputDir: options.outputDir,
    documentsPerShard: options.documents,
    threadCount: options.threads,
    zeroPadding: options.zeroes,
    filter: { namespace: options.namespace, excludeTitle: options.excludeTitle },
    compressionLevel: options.compressionLevel,
    logLevel: options.logLevel ?? resolveLogLevel(env),
  };
}
