import type { ArchiveEntry, RecordIndex } from '../model/ArchiveEntry.js';

/** Metadata about a record source, for diagnostics. */
export interface SourceMetadata {
  /** Short adapter name (e.g. `'memory'`, `'sqlite'`). */
  readonly name: string;
  /** File path or connection target, when there is one. */
  readonly location?: string;
}

/**
 * Port for reading an archive.
 *
 * A source is a single-consumer handle: it is never shared between the scanner
 * and a writer, nor between two writers. `iterate()` is a single pass over the
 * whole archive and cannot be restarted on the same instance.
 */
export interface RecordSource {
  /** Yield every entry once, in ascending index order. */
  iterate(): AsyncIterable<ArchiveEntry>;
  /** Return the raw payload of an entry. Rejects when the index is unknown. */
  resolve(index: RecordIndex): Promise<Uint8Array>;
  /** Release the handle. Calling it more than once has no effect. */
  close(): Promise<void>;
}

/** Opens independent `RecordSource` handles over the same archive. */
export interface RecordSourceFactory {
  open(): Promise<RecordSource>;
  describe(): SourceMetadata;
}
