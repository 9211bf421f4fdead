import type { RecordIndex } from '../model/ArchiveEntry.js';
import type { ShardBatch } from '../model/ShardBatch.js';
import { createShardBatch } from '../model/ShardBatch.js';

/**
 * Domain service that groups a stream of record indices into numbered batches.
 *
 * Pure logic without I/O. Operates as an async generator that
 * yields batches as they fill up, so the consumer controls the pace.
 */
export class BatchSplitter {
  constructor(private readonly documentsPerShard: number) {
    if (!Number.isSafeInteger(documentsPerShard) || documentsPerShard < 1) {
      throw new Error('Documents per shard must be a positive integer');
    }
  }

  /**
   * Split a stream of indices into batches of `documentsPerShard`.
   *
   * Shard ids increase by one per batch. The final batch may contain fewer
   * indices; an empty stream yields nothing.
   *
   * @param indices - Record indices in scan order.
   * @param firstShardId - Id of the first batch. Default: `1`.
   */
  async *split(indices: AsyncIterable<RecordIndex>, firstShardId = 1): AsyncIterable<ShardBatch> {
    let buffer: RecordIndex[] = [];
    let shardId = firstShardId;

    for await (const index of indices) {
      buffer.push(index);

      if (buffer.length >= this.documentsPerShard) {
        yield createShardBatch(shardId, buffer);
        buffer = [];
        shardId++;
      }
    }

    if (buffer.length > 0) {
      yield createShardBatch(shardId, buffer);
    }
  }
}
