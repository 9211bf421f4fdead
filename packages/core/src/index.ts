// Main entry point
export { ShardEngine } from './ShardEngine.js';
export type { ShardEngineConfig, RunStatusResult } from './ShardEngine.js';

// Domain model
export type { ArchiveEntry, RecordIndex } from './domain/model/ArchiveEntry.js';
export { isRecordIndex } from './domain/model/ArchiveEntry.js';
export type { ShardBatch } from './domain/model/ShardBatch.js';
export { TERMINATION_MARKER, createShardBatch, isTerminationMarker } from './domain/model/ShardBatch.js';
export type { RunProgress, RunSummary, SkipCounts, WriterReport } from './domain/model/Run.js';
export { RunStatus, canTransition, isTerminal } from './domain/model/RunStatus.js';
export { SkipReason, emptySkipCounts } from './domain/model/SkipReason.js';

// Errors
export { ShardRunError, RunOperation } from './domain/errors/ShardRunError.js';
export type { RunErrorContext } from './domain/errors/ShardRunError.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export { classifyEntry } from './domain/services/EntryFilter.js';
export type { EntryFilter } from './domain/services/EntryFilter.js';
export { formatShardFileName, SHARD_FILE_SUFFIX } from './domain/services/ShardNaming.js';
export {
  encodeFrame,
  decodeFrames,
  FrameDecoder,
  FRAME_HEADER_BYTES,
  MAX_FRAME_PAYLOAD,
} from './domain/services/FrameCodec.js';

// Application internals (for custom pipelines)
export { BatchQueue } from './application/BatchQueue.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorListener } from './application/EventBus.js';

// Ports (for custom implementations)
export type { RecordSource, RecordSourceFactory, SourceMetadata } from './domain/ports/RecordSource.js';
export type { ShardSink, ShardWriter } from './domain/ports/ShardSink.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RunStartedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  RunAbortedEvent,
  EntrySkippedEvent,
  ScanProgressEvent,
  ScanCompletedEvent,
  BatchQueuedEvent,
  ShardStartedEvent,
  ShardWrittenEvent,
  WorkerStartedEvent,
  WorkerStoppedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { InMemoryRecordSource, InMemoryRecordSourceFactory } from './infrastructure/sources/InMemoryRecordSource.js';
export type { InMemoryRecord } from './infrastructure/sources/InMemoryRecordSource.js';
export { InMemoryShardSink } from './infrastructure/sinks/InMemoryShardSink.js';
export { GzipShardSink } from './infrastructure/sinks/GzipShardSink.js';
export type { GzipShardSinkOptions } from './infrastructure/sinks/GzipShardSink.js';
export { readShard, inspectShard } from './infrastructure/readers/readShard.js';
