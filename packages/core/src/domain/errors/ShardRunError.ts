/** Operation that failed, carried by every `ShardRunError`. */
export const RunOperation = {
  OPEN_ARCHIVE: 'open-archive',
  PREPARE_OUTPUT: 'prepare-output',
  SCAN: 'scan',
  RESOLVE_RECORD: 'resolve-record',
  WRITE_SHARD: 'write-shard',
  ABORTED: 'aborted',
} as const;

export type RunOperation = (typeof RunOperation)[keyof typeof RunOperation];

/** Additional identifiers for diagnostics. */
export interface RunErrorContext {
  readonly shardId?: number;
  readonly recordIndex?: number;
  readonly workerId?: string;
  readonly fileName?: string;
}

/**
 * Fatal error of an extraction run.
 *
 * There is no retry policy: any `ShardRunError` ends the run. The `operation`
 * code identifies what failed; the original error is kept as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.run();
 * } catch (error) {
 *   if (error instanceof ShardRunError && error.operation === 'resolve-record') {
 *     console.error(`record ${String(error.context.recordIndex)} is unreadable`);
 *   }
 * }
 * ```
 */
export class ShardRunError extends Error {
  readonly operation: RunOperation;
  readonly context: RunErrorContext;

  constructor(operation: RunOperation, message: string, context: RunErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ShardRunError';
    this.operation = operation;
    this.context = context;
  }

  /** Wrap an arbitrary thrown value, keeping an existing `ShardRunError` untouched. */
  static wrap(operation: RunOperation, error: unknown, context: RunErrorContext = {}): ShardRunError {
    if (error instanceof ShardRunError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    return new ShardRunError(operation, `${operation} failed: ${detail}`, context, error);
  }
}
