import type { RecordIndex } from '../model/ArchiveEntry.js';
import type { RunSummary, WriterReport } from '../model/Run.js';
import type { SkipReason } from '../model/SkipReason.js';
import type { RunOperation } from '../errors/ShardRunError.js';

/** Emitted when `run()` is called, before any source is opened. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly documentsPerShard: number;
  readonly threadCount: number;
  readonly timestamp: number;
}

/** Emitted when the scanner has finished and every writer has stopped. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly summary: RunSummary;
  readonly timestamp: number;
}

/** Emitted when the run fails due to an unrecoverable error. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  readonly operation: RunOperation;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when `abort()` cancels a running run. */
export interface RunAbortedEvent {
  readonly type: 'run:aborted';
  readonly runId: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted for every entry the scanner drops. */
export interface EntrySkippedEvent {
  readonly type: 'entry:skipped';
  readonly runId: string;
  readonly recordIndex: RecordIndex;
  readonly title: string;
  readonly reason: SkipReason;
  readonly timestamp: number;
}

/** Emitted every `progressInterval` kept entries. */
export interface ScanProgressEvent {
  readonly type: 'scan:progress';
  readonly runId: string;
  readonly entriesScanned: number;
  readonly entriesKept: number;
  readonly timestamp: number;
}

/** Emitted once the single scanning pass is over and production is marked finished. */
export interface ScanCompletedEvent {
  readonly type: 'scan:completed';
  readonly runId: string;
  readonly entriesScanned: number;
  readonly entriesKept: number;
  readonly batchesQueued: number;
  readonly timestamp: number;
}

/** Emitted when the scanner has handed a batch to the queue. */
export interface BatchQueuedEvent {
  readonly type: 'batch:queued';
  readonly runId: string;
  readonly shardId: number;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted when a writer opens a shard file. */
export interface ShardStartedEvent {
  readonly type: 'shard:started';
  readonly runId: string;
  readonly workerId: string;
  readonly shardId: number;
  readonly fileName: string;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted when a shard file has been fully flushed and closed. */
export interface ShardWrittenEvent {
  readonly type: 'shard:written';
  readonly runId: string;
  readonly workerId: string;
  readonly shardId: number;
  readonly fileName: string;
  readonly recordCount: number;
  /** Uncompressed bytes, frame headers included. */
  readonly bytesWritten: number;
  readonly timestamp: number;
}

/** Emitted when a writer has opened its private source and starts polling the queue. */
export interface WorkerStartedEvent {
  readonly type: 'worker:started';
  readonly runId: string;
  readonly workerId: string;
  readonly timestamp: number;
}

/** Emitted when a writer has received the termination marker. */
export interface WorkerStoppedEvent {
  readonly type: 'worker:stopped';
  readonly runId: string;
  readonly report: WriterReport;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | RunAbortedEvent
  | EntrySkippedEvent
  | ScanProgressEvent
  | ScanCompletedEvent
  | BatchQueuedEvent
  | ShardStartedEvent
  | ShardWrittenEvent
  | WorkerStartedEvent
  | WorkerStoppedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
