import type { SkipReason } from './SkipReason.js';

/** Number of dropped entries per skip reason. */
export type SkipCounts = Readonly<Record<SkipReason, number>>;

/** Real-time counters for an in-flight run. */
export interface RunProgress {
  readonly entriesScanned: number;
  readonly entriesKept: number;
  readonly batchesQueued: number;
  readonly shardsWritten: number;
  readonly recordsWritten: number;
  readonly elapsedMs: number;
}

/** Final summary returned by `ShardEngine.run()` and emitted with `run:completed`. */
export interface RunSummary {
  readonly entriesScanned: number;
  readonly entriesKept: number;
  readonly entriesSkipped: SkipCounts;
  readonly shardsWritten: number;
  readonly recordsWritten: number;
  /** Uncompressed bytes written, frame headers included. */
  readonly bytesWritten: number;
  readonly elapsedMs: number;
}

/** Per-writer totals, returned when a writer observes the termination marker. */
export interface WriterReport {
  readonly workerId: string;
  readonly shardsWritten: number;
  readonly recordsWritten: number;
  readonly bytesWritten: number;
}
