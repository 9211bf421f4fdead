import { randomUUID } from 'node:crypto';
import type { RunProgress, RunSummary, SkipCounts } from '../domain/model/Run.js';
import type { RunStatus } from '../domain/model/RunStatus.js';
import type { SkipReason } from '../domain/model/SkipReason.js';
import type { EntryFilter } from '../domain/services/EntryFilter.js';
import type { RecordSourceFactory } from '../domain/ports/RecordSource.js';
import type { ShardSink } from '../domain/ports/ShardSink.js';
import type { HandlerErrorListener } from './EventBus.js';
import { canTransition } from '../domain/model/RunStatus.js';
import { emptySkipCounts } from '../domain/model/SkipReason.js';
import { BatchQueue } from './BatchQueue.js';
import { EventBus } from './EventBus.js';

/** Validated settings of one run. */
export interface RunSettings {
  readonly source: RecordSourceFactory;
  readonly sink: ShardSink;
  readonly filter: EntryFilter;
  readonly documentsPerShard: number;
  readonly threadCount: number;
  readonly zeroPadding: number;
  readonly queueCapacity: number;
  readonly progressInterval: number;
  readonly onHandlerError?: HandlerErrorListener;
}

/**
 * Mutable state shared by the scanner, the writers and the engine facade within one run.
 *
 * Internal class: use cases receive a reference and update the counters as
 * the run progresses. Only the queue is shared between concurrent tasks.
 */
export class RunContext {
  readonly runId: string;
  readonly settings: RunSettings;
  readonly eventBus: EventBus;
  readonly queue: BatchQueue;

  status: RunStatus = 'CREATED';
  startedAt?: number;
  finishedAt?: number;
  abortController = new AbortController();

  entriesScanned = 0;
  entriesKept = 0;
  batchesQueued = 0;
  shardsWritten = 0;
  recordsWritten = 0;
  bytesWritten = 0;
  readonly skipped: Record<SkipReason, number>;

  constructor(settings: RunSettings) {
    this.settings = settings;
    this.runId = randomUUID();
    this.eventBus = new EventBus(settings.onHandlerError);
    this.queue = new BatchQueue(settings.queueCapacity);
    this.skipped = emptySkipCounts();
  }

  transitionTo(newStatus: RunStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  elapsedMs(): number {
    if (this.startedAt === undefined) return 0;
    return (this.finishedAt ?? Date.now()) - this.startedAt;
  }

  buildProgress(): RunProgress {
    return {
      entriesScanned: this.entriesScanned,
      entriesKept: this.entriesKept,
      batchesQueued: this.batchesQueued,
      shardsWritten: this.shardsWritten,
      recordsWritten: this.recordsWritten,
      elapsedMs: this.elapsedMs(),
    };
  }

  buildSummary(): RunSummary {
    const entriesSkipped: SkipCounts = { ...this.skipped };
    return {
      entriesScanned: this.entriesScanned,
      entriesKept: this.entriesKept,
      entriesSkipped,
      shardsWritten: this.shardsWritten,
      recordsWritten: this.recordsWritten,
      bytesWritten: this.bytesWritten,
      elapsedMs: this.elapsedMs(),
    };
  }
}
