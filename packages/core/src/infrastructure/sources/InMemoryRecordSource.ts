import type { ArchiveEntry, RecordIndex } from '../../domain/model/ArchiveEntry.js';
import type { RecordSource, RecordSourceFactory, SourceMetadata } from '../../domain/ports/RecordSource.js';

/** An archive entry together with its payload. */
export interface InMemoryRecord extends ArchiveEntry {
  readonly payload: Uint8Array | string;
}

/**
 * Record source over entries held in memory. Entries are iterated in ascending
 * index order regardless of the order they were supplied in.
 */
export class InMemoryRecordSource implements RecordSource {
  private readonly entries: readonly ArchiveEntry[];
  private readonly payloads: ReadonlyMap<RecordIndex, Uint8Array>;
  private iterated = false;
  private closed = false;

  constructor(entries: readonly ArchiveEntry[], payloads: ReadonlyMap<RecordIndex, Uint8Array>) {
    this.entries = entries;
    this.payloads = payloads;
  }

  async *iterate(): AsyncIterable<ArchiveEntry> {
    this.assertOpen();
    if (this.iterated) {
      throw new Error('InMemoryRecordSource: entries have already been iterated. Open a new source.');
    }
    this.iterated = true;

    for (const entry of this.entries) {
      // Yield to the event loop so writers progress while the scan runs
      await Promise.resolve();
      yield entry;
    }
  }

  async resolve(index: RecordIndex): Promise<Uint8Array> {
    this.assertOpen();
    const payload = this.payloads.get(index);
    if (payload === undefined) {
      throw new Error(`Record ${String(index)} not found`);
    }
    return payload;
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('InMemoryRecordSource: source is closed');
  }
}

/** Factory handing out independent `InMemoryRecordSource` handles over the same records. */
export class InMemoryRecordSourceFactory implements RecordSourceFactory {
  private readonly entries: readonly ArchiveEntry[];
  private readonly payloads: ReadonlyMap<RecordIndex, Uint8Array>;
  private opened = 0;

  constructor(records: readonly InMemoryRecord[]) {
    const sorted = [...records].sort((a, b) => a.index - b.index);
    const payloads = new Map<RecordIndex, Uint8Array>();

    for (const { payload, ...entry } of sorted) {
      if (payloads.has(entry.index)) {
        throw new Error(`Duplicate record index ${String(entry.index)}`);
      }
      payloads.set(entry.index, typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload);
    }

    this.entries = sorted.map(({ index, title, namespace, isRedirect, isDeleted }) => ({
      index,
      title,
      namespace,
      isRedirect,
      isDeleted,
    }));
    this.payloads = payloads;
  }

  /** Number of handles opened so far. */
  get openedCount(): number {
    return this.opened;
  }

  open(): Promise<RecordSource> {
    this.opened++;
    return Promise.resolve(new InMemoryRecordSource(this.entries, this.payloads));
  }

  describe(): SourceMetadata {
    return { name: 'memory' };
  }
}
