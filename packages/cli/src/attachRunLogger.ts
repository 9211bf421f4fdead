import type { DomainEvent, ShardEngine } from '@shardkit/core';
import type { Logger } from './logger.js';

/**
 * Turn engine events into log lines. Per-entry and per-shard events are
 * logged at debug; progress and the summary at info.
 *
 * @returns A function that detaches the logger from the engine.
 */
export function attachRunLogger(engine: ShardEngine, logger: Logger): () => void {
  const log = logger.child({ runId: engine.getRunId() });

  const handler = (event: DomainEvent): void => {
    switch (event.type) {
      case 'run:started':
        log.info(
          { documentsPerShard: event.documentsPerShard, threadCount: event.threadCount },
          'Extraction started',
        );
        break;
      case 'entry:skipped':
        log.debug({ recordIndex: event.recordIndex, title: event.title, reason: event.reason }, 'Entry skipped');
        break;
      case 'scan:progress':
        log.info({ entriesScanned: event.entriesScanned, entriesKept: event.entriesKept }, 'Scan progress');
        break;
      case 'scan:completed':
        log.info(
          { entriesScanned: event.entriesScanned, entriesKept: event.entriesKept, batchesQueued: event.batchesQueued },
          'Scan completed',
        );
        break;
      case 'shard:written':
        log.debug(
          {
            workerId: event.workerId,
            shardId: event.shardId,
            fileName: event.fileName,
            recordCount: event.recordCount,
            bytesWritten: event.bytesWritten,
          },
          'Shard written',
        );
        break;
      case 'worker:stopped':
        log.debug({ ...event.report }, 'Writer stopped');
        break;
      case 'run:completed':
        log.info({ ...event.summary }, 'Extraction completed');
        break;
      case 'run:failed':
        log.error({ operation: event.operation, error: event.error }, 'Extraction failed');
        break;
      case 'run:aborted':
        log.warn({ reason: event.reason }, 'Extraction aborted');
        break;
      case 'batch:queued':
      case 'shard:started':
      case 'worker:started':
        log.trace({ event: event.type }, 'Run event');
        break;
    }
  };

  engine.onAny(handler);
  return () => {
    engine.offAny(handler);
  };
}
