import type { ShardBatch } from '../domain/model/ShardBatch.js';
import { TERMINATION_MARKER } from '../domain/model/ShardBatch.js';

interface Waiter {
  readonly resolve: () => void;
  readonly reject: (reason: Error) => void;
}

/**
 * Bounded FIFO of work batches between the single scanner and the writers.
 *
 * `push()` waits while the queue is full, `pop()` waits while it is empty and
 * production is still running. Waiting is promise-based: a waiter re-checks its
 * condition every time it is woken, so a wake-up never hands out a batch twice.
 *
 * Once production has finished, `pop()` keeps draining pending batches and then
 * returns `TERMINATION_MARKER` to every caller. All idle consumers are woken at
 * once when production finishes.
 *
 * `cancel()` fails every current and future waiter; it is used to stop sibling
 * workers after a fatal error.
 */
export class BatchQueue {
  private readonly pending: ShardBatch[] = [];
  private readonly notFull: Waiter[] = [];
  private readonly available: Waiter[] = [];
  private productionFinished = false;
  private cancelReason: Error | null = null;

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new Error('Queue capacity must be a positive integer');
    }
  }

  /** Number of batches waiting for a consumer. */
  get size(): number {
    return this.pending.length;
  }

  get isProductionFinished(): boolean {
    return this.productionFinished;
  }

  get isCancelled(): boolean {
    return this.cancelReason !== null;
  }

  /**
   * Enqueue a batch at the tail, waiting until fewer than `capacity` batches are pending.
   *
   * @throws Error when production was already marked finished, or the queue is cancelled.
   */
  async push(batch: ShardBatch): Promise<void> {
    this.assertNotCancelled();
    if (this.productionFinished) {
      throw new Error(`Cannot push shard ${String(batch.shardId)}: production already finished`);
    }

    while (this.pending.length >= this.capacity) {
      await this.waitOn(this.notFull);
    }

    this.pending.push(batch);
    this.wakeOne(this.available);
  }

  /**
   * Take the oldest pending batch, waiting while the queue is empty.
   *
   * @returns The head batch, or `TERMINATION_MARKER` once production has
   * finished and nothing is pending. Callers must stop polling after the marker.
   */
  async pop(): Promise<ShardBatch> {
    this.assertNotCancelled();

    while (this.pending.length === 0 && !this.productionFinished) {
      await this.waitOn(this.available);
    }

    const batch = this.pending.shift();
    if (batch === undefined) {
      return TERMINATION_MARKER;
    }

    this.wakeOne(this.notFull);
    return batch;
  }

  /** Signal that no batch will ever be pushed again and wake every idle consumer. Idempotent. */
  markProductionFinished(): void {
    if (this.productionFinished) return;
    this.productionFinished = true;
    this.wakeAll(this.available);
  }

  /**
   * Fail every waiting and future `push()`/`pop()` with `reason` and drop pending batches.
   * Only the first call has an effect.
   */
  cancel(reason: Error): void {
    if (this.cancelReason) return;
    this.cancelReason = reason;
    this.pending.length = 0;
    for (const waiter of [...this.notFull.splice(0), ...this.available.splice(0)]) {
      waiter.reject(reason);
    }
  }

  private waitOn(waiters: Waiter[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      waiters.push({ resolve, reject });
    }).then(() => {
      this.assertNotCancelled();
    });
  }

  private wakeOne(waiters: Waiter[]): void {
    waiters.shift()?.resolve();
  }

  private wakeAll(waiters: Waiter[]): void {
    for (const waiter of waiters.splice(0)) {
      waiter.resolve();
    }
  }

  private assertNotCancelled(): void {
    if (this.cancelReason) throw this.cancelReason;
  }
}
