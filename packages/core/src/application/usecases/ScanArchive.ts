import type { RecordIndex } from '../../domain/model/ArchiveEntry.js';
import type { RecordSource } from '../../domain/ports/RecordSource.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { classifyEntry } from '../../domain/services/EntryFilter.js';
import { RunOperation, ShardRunError } from '../../domain/errors/ShardRunError.js';
import type { RunContext } from '../RunContext.js';

/**
 * Use case: the single sequential pass over the archive.
 *
 * Classifies every entry, groups the qualifying indices into batches of
 * `documentsPerShard` and pushes them to the queue (waiting while it is full).
 * Marks production finished exactly once when the pass is over, whether or
 * not any batch was produced.
 */
export class ScanArchive {
  constructor(private readonly ctx: RunContext) {}

  async execute(source: RecordSource): Promise<void> {
    const splitter = new BatchSplitter(this.ctx.settings.documentsPerShard);

    try {
      for await (const batch of splitter.split(this.qualifyingIndices(source))) {
        await this.ctx.queue.push(batch);
        this.ctx.batchesQueued++;

        this.ctx.eventBus.emit({
          type: 'batch:queued',
          runId: this.ctx.runId,
          shardId: batch.shardId,
          recordCount: batch.indices.length,
          timestamp: Date.now(),
        });
      }
    } catch (error) {
      throw ShardRunError.wrap(RunOperation.SCAN, error);
    }

    this.ctx.queue.markProductionFinished();

    this.ctx.eventBus.emit({
      type: 'scan:completed',
      runId: this.ctx.runId,
      entriesScanned: this.ctx.entriesScanned,
      entriesKept: this.ctx.entriesKept,
      batchesQueued: this.ctx.batchesQueued,
      timestamp: Date.now(),
    });
  }

  private async *qualifyingIndices(source: RecordSource): AsyncIterable<RecordIndex> {
    const { filter, progressInterval } = this.ctx.settings;

    for await (const entry of source.iterate()) {
      this.ctx.signal.throwIfAborted();
      this.ctx.entriesScanned++;

      const reason = classifyEntry(entry, filter);
      if (reason !== null) {
        this.ctx.skipped[reason]++;
        this.ctx.eventBus.emit({
          type: 'entry:skipped',
          runId: this.ctx.runId,
          recordIndex: entry.index,
          title: entry.title,
          reason,
          timestamp: Date.now(),
        });
        continue;
      }

      this.ctx.entriesKept++;
      if (this.ctx.entriesKept % progressInterval === 0) {
        this.ctx.eventBus.emit({
          type: 'scan:progress',
          runId: this.ctx.runId,
          entriesScanned: this.ctx.entriesScanned,
          entriesKept: this.ctx.entriesKept,
          timestamp: Date.now(),
        });
      }

      yield entry.index;
    }
  }
}
