import type { RecordIndex } from '../../domain/model/ArchiveEntry.js';
import type { ShardBatch } from '../../domain/model/ShardBatch.js';
import type { WriterReport } from '../../domain/model/Run.js';
import type { RecordSource } from '../../domain/ports/RecordSource.js';
import type { ShardWriter } from '../../domain/ports/ShardSink.js';
import { isTerminationMarker } from '../../domain/model/ShardBatch.js';
import { encodeFrame } from '../../domain/services/FrameCodec.js';
import { formatShardFileName } from '../../domain/services/ShardNaming.js';
import { RunOperation, ShardRunError } from '../../domain/errors/ShardRunError.js';
import type { RunContext } from '../RunContext.js';

/**
 * Use case: one member of the writer pool.
 *
 * Pops batches until the termination marker arrives. Each batch becomes one
 * shard file: payloads are resolved through the writer's private source in
 * batch order and appended as length-prefixed frames, and the file is closed
 * before the next batch is taken.
 */
export class WriteShards {
  private shardsWritten = 0;
  private recordsWritten = 0;
  private bytesWritten = 0;

  constructor(
    private readonly ctx: RunContext,
    readonly workerId: string,
  ) {}

  async execute(source: RecordSource): Promise<WriterReport> {
    this.ctx.eventBus.emit({
      type: 'worker:started',
      runId: this.ctx.runId,
      workerId: this.workerId,
      timestamp: Date.now(),
    });

    for (;;) {
      const batch = await this.ctx.queue.pop();
      if (isTerminationMarker(batch)) break;
      await this.writeShard(batch, source);
    }

    const report: WriterReport = {
      workerId: this.workerId,
      shardsWritten: this.shardsWritten,
      recordsWritten: this.recordsWritten,
      bytesWritten: this.bytesWritten,
    };

    this.ctx.eventBus.emit({
      type: 'worker:stopped',
      runId: this.ctx.runId,
      report,
      timestamp: Date.now(),
    });

    return report;
  }

  private async writeShard(batch: ShardBatch, source: RecordSource): Promise<void> {
    const fileName = formatShardFileName(batch.shardId, this.ctx.settings.zeroPadding);
    const context = { shardId: batch.shardId, workerId: this.workerId, fileName };

    let writer: ShardWriter;
    try {
      writer = await this.ctx.settings.sink.open(fileName);
    } catch (error) {
      throw ShardRunError.wrap(RunOperation.WRITE_SHARD, error, context);
    }

    this.ctx.eventBus.emit({
      type: 'shard:started',
      runId: this.ctx.runId,
      workerId: this.workerId,
      shardId: batch.shardId,
      fileName,
      recordCount: batch.indices.length,
      timestamp: Date.now(),
    });

    let bytes = 0;
    try {
      for (const index of batch.indices) {
        this.ctx.signal.throwIfAborted();
        const frame = encodeFrame(await this.resolve(source, index, batch.shardId));
        try {
          await writer.write(frame);
        } catch (error) {
          throw ShardRunError.wrap(RunOperation.WRITE_SHARD, error, { ...context, recordIndex: index });
        }
        bytes += frame.length;
      }

      try {
        await writer.close();
      } catch (error) {
        throw ShardRunError.wrap(RunOperation.WRITE_SHARD, error, context);
      }
    } catch (error) {
      await this.discard(writer, error);
      throw error;
    }

    this.shardsWritten++;
    this.recordsWritten += batch.indices.length;
    this.bytesWritten += bytes;
    this.ctx.shardsWritten++;
    this.ctx.recordsWritten += batch.indices.length;
    this.ctx.bytesWritten += bytes;

    this.ctx.eventBus.emit({
      type: 'shard:written',
      runId: this.ctx.runId,
      workerId: this.workerId,
      shardId: batch.shardId,
      fileName,
      recordCount: batch.indices.length,
      bytesWritten: bytes,
      timestamp: Date.now(),
    });
  }

  private async resolve(source: RecordSource, index: RecordIndex, shardId: number): Promise<Uint8Array> {
    try {
      return await source.resolve(index);
    } catch (error) {
      throw ShardRunError.wrap(RunOperation.RESOLVE_RECORD, error, {
        shardId,
        recordIndex: index,
        workerId: this.workerId,
      });
    }
  }

  /** Remove a partial shard. A failure to do so is reported alongside the original error. */
  private async discard(writer: ShardWriter, original: unknown): Promise<void> {
    try {
      await writer.discard();
    } catch (discardError) {
      const primary = ShardRunError.wrap(RunOperation.WRITE_SHARD, original, { workerId: this.workerId });
      throw new ShardRunError(
        primary.operation,
        `${primary.message} (partial shard could not be removed)`,
        primary.context,
        new AggregateError([original, discardError]),
      );
    }
  }
}
