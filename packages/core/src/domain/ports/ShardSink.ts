/** An open shard file accepting framed payloads. */
export interface ShardWriter {
  /** Append bytes, waiting for the underlying stream to drain when it is saturated. */
  write(chunk: Uint8Array): Promise<void>;
  /** Flush everything and close the file. */
  close(): Promise<void>;
  /** Abandon a partially written shard: close the stream and remove the file. */
  discard(): Promise<void>;
}

/**
 * Port for persisting shards.
 *
 * Each call to `open()` creates (or truncates) one file, owned exclusively by
 * the caller until it is closed or discarded.
 */
export interface ShardSink {
  /** Create the output location. Called once before any shard is opened. */
  prepare(): Promise<void>;
  open(fileName: string): Promise<ShardWriter>;
}
