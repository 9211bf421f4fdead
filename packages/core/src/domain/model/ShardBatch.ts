import type { RecordIndex } from './ArchiveEntry.js';

/** A numbered group of record indices destined for exactly one shard file. */
export interface ShardBatch {
  /** One-based shard number assigned by the scanner. `0` is reserved for the termination marker. */
  readonly shardId: number;
  /** Record indices in archive scan order. */
  readonly indices: readonly RecordIndex[];
}

/**
 * In-band signal returned by the queue once production has finished and every
 * pending batch has been handed out. Never written to disk.
 */
export const TERMINATION_MARKER: ShardBatch = Object.freeze({
  shardId: 0,
  indices: Object.freeze([]),
});

/** Create a work batch. Throws when the shard id is not positive or the batch is empty. */
export function createShardBatch(shardId: number, indices: readonly RecordIndex[]): ShardBatch {
  if (!Number.isSafeInteger(shardId) || shardId < 1) {
    throw new Error(`Shard id must be a positive integer, got ${String(shardId)}`);
  }
  if (indices.length === 0) {
    throw new Error(`Shard ${String(shardId)} must contain at least one record`);
  }
  return { shardId, indices };
}

export function isTerminationMarker(batch: ShardBatch): boolean {
  return batch.shardId === 0 && batch.indices.length === 0;
}
