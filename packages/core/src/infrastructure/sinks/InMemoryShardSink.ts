import type { ShardSink, ShardWriter } from '../../domain/ports/ShardSink.js';

/** Non-persistent sink keeping each shard's uncompressed bytes in memory. */
export class InMemoryShardSink implements ShardSink {
  private readonly shards = new Map<string, Buffer>();
  private prepared = false;

  prepare(): Promise<void> {
    this.prepared = true;
    return Promise.resolve();
  }

  open(fileName: string): Promise<ShardWriter> {
    if (!this.prepared) {
      return Promise.reject(new Error('InMemoryShardSink: prepare() must be called before open()'));
    }

    const chunks: Buffer[] = [];
    const shards = this.shards;
    shards.delete(fileName);

    return Promise.resolve({
      write(chunk: Uint8Array): Promise<void> {
        chunks.push(Buffer.from(chunk));
        return Promise.resolve();
      },
      close(): Promise<void> {
        shards.set(fileName, Buffer.concat(chunks));
        return Promise.resolve();
      },
      discard(): Promise<void> {
        chunks.length = 0;
        shards.delete(fileName);
        return Promise.resolve();
      },
    });
  }

  /** Names of all closed shards, sorted. */
  fileNames(): string[] {
    return [...this.shards.keys()].sort();
  }

  /** Uncompressed contents of a closed shard. */
  get(fileName: string): Buffer | undefined {
    return this.shards.get(fileName);
  }
}
