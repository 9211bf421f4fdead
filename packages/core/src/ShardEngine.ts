import type { RunProgress, RunSummary } from './domain/model/Run.js';
import type { RunStatus } from './domain/model/RunStatus.js';
import type { EntryFilter } from './domain/services/EntryFilter.js';
import type { RecordSource, RecordSourceFactory } from './domain/ports/RecordSource.js';
import type { ShardSink } from './domain/ports/ShardSink.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { HandlerErrorListener } from './application/EventBus.js';
import { RunOperation, ShardRunError } from './domain/errors/ShardRunError.js';
import { RunContext } from './application/RunContext.js';
import { ScanArchive } from './application/usecases/ScanArchive.js';
import { WriteShards } from './application/usecases/WriteShards.js';

/** Configuration of an extraction run. */
export interface ShardEngineConfig {
  /** Opens independent handles over the archive: one for the scanner, one per writer. */
  readonly source: RecordSourceFactory;
  /** Destination of the shard files. */
  readonly sink: ShardSink;
  /** Which entries qualify. */
  readonly filter: EntryFilter;
  /** Number of records per shard. Default: `2500`. */
  readonly documentsPerShard?: number;
  /** Number of concurrent writers. Default: `10`. */
  readonly threadCount?: number;
  /** Digits of the zero-padded shard number in file names. Default: `4`. */
  readonly zeroPadding?: number;
  /** Maximum number of batches waiting for a writer. Default: `threadCount`. */
  readonly queueCapacity?: number;
  /** Emit `scan:progress` every this many qualifying entries. Default: `1000`. */
  readonly progressInterval?: number;
  /** Receives errors thrown by event subscribers. */
  readonly onHandlerError?: HandlerErrorListener;
}

/** Snapshot returned by `ShardEngine.getStatus()`. */
export interface RunStatusResult {
  readonly runId: string;
  readonly status: RunStatus;
  readonly progress: RunProgress;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

/**
 * Facade that runs one extraction: scan → batch queue → writer pool → shard files.
 *
 * A single scanner walks the archive once and feeds a bounded queue; `threadCount`
 * writers drain it concurrently, each with its own record source handle. The
 * first fatal error cancels the queue so every sibling stops, and `run()`
 * rejects with that error.
 *
 * @example
 * ```typescript
 * const engine = new ShardEngine({
 *   source: new InMemoryRecordSourceFactory(records),
 *   sink: new GzipShardSink('./out'),
 *   filter: { namespace: 'A', excludeTitle: '(disambiguation)' },
 *   documentsPerShard: 2500,
 *   threadCount: 8,
 * });
 * engine.on('shard:written', (e) => console.log(e.fileName));
 * const summary = await engine.run();
 * ```
 */
export class ShardEngine {
  private readonly ctx: RunContext;
  private failure: ShardRunError | null = null;
  private stopped: Promise<void> = Promise.resolve();

  constructor(config: ShardEngineConfig) {
    const threadCount = requirePositiveInteger('Thread count', config.threadCount ?? 10);
    this.ctx = new RunContext({
      source: config.source,
      sink: config.sink,
      filter: config.filter,
      documentsPerShard: requirePositiveInteger('Documents per shard', config.documentsPerShard ?? 2500),
      threadCount,
      zeroPadding: requirePositiveInteger('Zero padding', config.zeroPadding ?? 4),
      queueCapacity: requirePositiveInteger('Queue capacity', config.queueCapacity ?? threadCount),
      progressInterval: requirePositiveInteger('Progress interval', config.progressInterval ?? 1000),
      onHandlerError: config.onHandlerError,
    });
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Perform the run. Resolves once the scan is over and every writer has
   * observed the termination marker.
   *
   * @throws ShardRunError identifying the failed operation.
   * @throws Error if the engine has already been started.
   */
  async run(): Promise<RunSummary> {
    const initialStatus = this.ctx.status;
    if (initialStatus !== 'CREATED') {
      throw new Error(`Cannot start run from status '${initialStatus}'`);
    }

    this.ctx.transitionTo('RUNNING');
    this.ctx.startedAt = Date.now();

    let markStopped: () => void = () => undefined;
    this.stopped = new Promise<void>((resolve) => {
      markStopped = resolve;
    });

    // Yield to next microtask so handlers registered after run() on the same tick receive this event
    await Promise.resolve();

    this.ctx.eventBus.emit({
      type: 'run:started',
      runId: this.ctx.runId,
      documentsPerShard: this.ctx.settings.documentsPerShard,
      threadCount: this.ctx.settings.threadCount,
      timestamp: Date.now(),
    });

    const opened: RecordSource[] = [];
    try {
      await this.execute(opened);
    } catch (error) {
      this.fail(ShardRunError.wrap(RunOperation.SCAN, error));
    }

    await this.closeSources(opened);
    this.ctx.finishedAt = Date.now();
    markStopped();

    if (this.failure) {
      if (this.ctx.status === 'RUNNING') {
        this.ctx.transitionTo('FAILED');
        this.ctx.eventBus.emit({
          type: 'run:failed',
          runId: this.ctx.runId,
          operation: this.failure.operation,
          error: this.failure.message,
          timestamp: Date.now(),
        });
      }
      throw this.failure;
    }

    this.ctx.transitionTo('COMPLETED');
    const summary = this.ctx.buildSummary();
    this.ctx.eventBus.emit({
      type: 'run:completed',
      runId: this.ctx.runId,
      summary,
      timestamp: Date.now(),
    });
    return summary;
  }

  /**
   * Cancel a running run. Every writer stops after its current record, partial
   * shards are removed, and `run()` rejects with an `aborted` error.
   * Resolves once all tasks have stopped. No effect unless the run is in progress.
   */
  async abort(reason = 'Run aborted'): Promise<void> {
    if (this.ctx.status !== 'RUNNING') return;

    this.ctx.transitionTo('ABORTED');
    this.ctx.eventBus.emit({
      type: 'run:aborted',
      runId: this.ctx.runId,
      reason,
      timestamp: Date.now(),
    });
    this.fail(new ShardRunError(RunOperation.ABORTED, reason));
    await this.stopped;
  }

  /** Get current status and progress counters. */
  getStatus(): RunStatusResult {
    return {
      runId: this.ctx.runId,
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
    };
  }

  /** Get the unique run identifier (UUID). */
  getRunId(): string {
    return this.ctx.runId;
  }

  private async execute(opened: RecordSource[]): Promise<void> {
    const { sink, threadCount } = this.ctx.settings;

    const scanSource = await this.openSource(opened);

    try {
      await sink.prepare();
    } catch (error) {
      throw ShardRunError.wrap(RunOperation.PREPARE_OUTPUT, error);
    }

    const writerSources: RecordSource[] = [];
    for (let i = 0; i < threadCount; i++) {
      writerSources.push(await this.openSource(opened));
    }

    this.ctx.signal.throwIfAborted();

    const scanner = this.guard(RunOperation.SCAN, new ScanArchive(this.ctx).execute(scanSource));
    const writers = writerSources.map((source, i) =>
      this.guard(RunOperation.WRITE_SHARD, new WriteShards(this.ctx, `writer-${String(i + 1)}`).execute(source)),
    );

    await Promise.allSettled([scanner, ...writers]);
  }

  /** Record the first failure of a task and cancel its siblings. */
  private guard<T>(operation: RunOperation, task: Promise<T>): Promise<T> {
    return task.catch((error: unknown) => {
      const runError = ShardRunError.wrap(operation, error);
      this.fail(runError);
      throw runError;
    });
  }

  private fail(error: ShardRunError): void {
    if (this.failure) return;
    this.failure = error;
    this.ctx.abortController.abort(error);
    this.ctx.queue.cancel(error);
  }

  private async openSource(opened: RecordSource[]): Promise<RecordSource> {
    const metadata = this.ctx.settings.source.describe();
    try {
      const source = await this.ctx.settings.source.open();
      opened.push(source);
      return source;
    } catch (error) {
      throw ShardRunError.wrap(RunOperation.OPEN_ARCHIVE, error, { fileName: metadata.location });
    }
  }

  private async closeSources(sources: readonly RecordSource[]): Promise<void> {
    const results = await Promise.allSettled(sources.map((source) => source.close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.fail(ShardRunError.wrap(RunOperation.OPEN_ARCHIVE, result.reason));
      }
    }
  }
}
