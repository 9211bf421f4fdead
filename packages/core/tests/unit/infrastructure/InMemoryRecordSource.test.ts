import { describe, it, expect } from 'vitest';
import { InMemoryRecordSourceFactory } from '../../../src/infrastructure/sources/InMemoryRecordSource.js';
import type { ArchiveEntry } from '../../../src/domain/model/ArchiveEntry.js';
import { article } from '../../support/archive.js';

async function collect(entries: AsyncIterable<ArchiveEntry>): Promise<number[]> {
  const indices: number[] = [];
  for await (const entry of entries) {
    indices.push(entry.index);
  }
  return indices;
}

describe('InMemoryRecordSourceFactory', () => {
  it('should iterate entries in ascending index order', async () => {
    const factory = new InMemoryRecordSourceFactory([article(7), article(2), article(5)]);
    const source = await factory.open();

    expect(await collect(source.iterate())).toEqual([2, 5, 7]);
  });

  it('should not expose payloads on iterated entries', async () => {
    const source = await new InMemoryRecordSourceFactory([article(1)]).open();
    const entries: ArchiveEntry[] = [];
    for await (const entry of source.iterate()) {
      entries.push(entry);
    }

    expect(entries[0]).toEqual({ index: 1, title: 'Article 1', namespace: 'A', isRedirect: false, isDeleted: false });
  });

  it('should resolve string payloads as UTF-8 bytes', async () => {
    const source = await new InMemoryRecordSourceFactory([article(3, 'Árvíztűrő')]).open();

    const payload = await source.resolve(3);

    expect(Buffer.from(payload).toString('utf-8')).toBe('<p>Árvíztűrő</p>');
  });

  it('should reject unknown indices', async () => {
    const source = await new InMemoryRecordSourceFactory([article(1)]).open();

    await expect(source.resolve(99)).rejects.toThrow('Record 99 not found');
  });

  it('should allow a single pass per handle', async () => {
    const source = await new InMemoryRecordSourceFactory([article(1)]).open();
    await collect(source.iterate());

    await expect(collect(source.iterate())).rejects.toThrow('entries have already been iterated');
  });

  it('should hand out independent handles', async () => {
    const factory = new InMemoryRecordSourceFactory([article(1), article(2)]);
    const first = await factory.open();
    const second = await factory.open();

    expect(await collect(first.iterate())).toEqual([1, 2]);
    expect(await collect(second.iterate())).toEqual([1, 2]);
    expect(factory.openedCount).toBe(2);
  });

  it('should refuse calls after close', async () => {
    const source = await new InMemoryRecordSourceFactory([article(1)]).open();
    await source.close();
    await source.close();

    await expect(source.resolve(1)).rejects.toThrow('InMemoryRecordSource: source is closed');
  });

  it('should reject duplicate indices', () => {
    expect(() => new InMemoryRecordSourceFactory([article(4), article(4)])).toThrow('Duplicate record index 4');
  });
});
