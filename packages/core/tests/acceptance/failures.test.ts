import { describe, it, expect, vi } from 'vitest';
import { ShardEngine } from '../../src/ShardEngine.js';
import type { ShardEngineConfig } from '../../src/ShardEngine.js';
import { ShardRunError } from '../../src/domain/errors/ShardRunError.js';
import { InMemoryRecordSourceFactory } from '../../src/infrastructure/sources/InMemoryRecordSource.js';
import { InMemoryShardSink } from '../../src/infrastructure/sinks/InMemoryShardSink.js';
import type { ShardSink, ShardWriter } from '../../src/domain/ports/ShardSink.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { articles } from '../support/archive.js';
import { FaultySourceFactory } from '../support/faults.js';

function createEngine(overrides: Partial<ShardEngineConfig>) {
  const sink = new InMemoryShardSink();
  const engine = new ShardEngine({
    source: new InMemoryRecordSourceFactory(articles(6)),
    sink,
    filter: { namespace: 'A' },
    documentsPerShard: 2,
    threadCount: 1,
    ...overrides,
  });
  const events: DomainEvent[] = [];
  engine.onAny((event) => events.push(event));
  return { engine, sink, events };
}

/** Settle the run and hand back its rejection, failing the test if it resolved. */
async function runError(engine: ShardEngine): Promise<ShardRunError> {
  const outcome = await engine.run().then(
    () => null,
    (error: unknown) => error,
  );
  if (!(outcome instanceof ShardRunError)) {
    throw new Error(`Expected the run to fail with a ShardRunError, got ${String(outcome)}`);
  }
  return outcome;
}

describe('Unresolvable records', () => {
  it('should fail the run naming the record', async () => {
    const source = new FaultySourceFactory(new InMemoryRecordSourceFactory(articles(6)), { corrupt: [3] });
    const { engine } = createEngine({ source });

    const error = await runError(engine);

    expect(error.operation).toBe('resolve-record');
    expect(error.message).toBe('resolve-record failed: Record 3 is corrupt');
    expect(error.context).toEqual({ shardId: 2, recordIndex: 3, workerId: 'writer-1' });
    expect(error.cause).toEqual(new Error('Record 3 is corrupt'));
    expect(engine.getStatus().status).toBe('FAILED');
  });

  it('should keep completed shards and discard the partial one', async () => {
    const source = new FaultySourceFactory(new InMemoryRecordSourceFactory(articles(6)), { corrupt: [3] });
    const { engine, sink } = createEngine({ source });

    await runError(engine);

    expect(sink.fileNames()).toEqual(['0001.htmls.gz']);
  });

  it('should emit run:failed and close every source', async () => {
    const source = new FaultySourceFactory(new InMemoryRecordSourceFactory(articles(6)), { corrupt: [0] });
    const { engine, events } = createEngine({ source, threadCount: 3 });

    await runError(engine);

    expect(events.at(-1)).toMatchObject({ type: 'run:failed', operation: 'resolve-record' });
    expect(events.some((event) => event.type === 'run:completed')).toBe(false);
    expect(source.opened).toBe(4);
    expect(source.closed).toBe(4);
  });

  it('should stop sibling writers after the first failure', async () => {
    const source = new FaultySourceFactory(new InMemoryRecordSourceFactory(articles(40)), { corrupt: [0] });
    const { engine, sink } = createEngine({ source, threadCount: 4 });

    await runError(engine);

    expect(sink.fileNames().length).toBeLessThan(20);
    expect(sink.fileNames()).not.toContain('0001.htmls.gz');
  });
});

describe('Setup failures', () => {
  it('should fail with open-archive when the archive cannot be opened', async () => {
    const source = new FaultySourceFactory(new InMemoryRecordSourceFactory(articles(4)), { failOpenAt: 1 });
    const { engine, sink, events } = createEngine({ source });

    const error = await runError(engine);

    expect(error.operation).toBe('open-archive');
    expect(error.message).toBe('open-archive failed: archive unreadable');
    expect(error.context.fileName).toBe('/archives/test.zim');
    expect(sink.fileNames()).toEqual([]);
    expect(events.map((event) => event.type)).toEqual(['run:started', 'run:failed']);
  });

  it('should close already opened sources when a writer source cannot be opened', async () => {
    const source = new FaultySourceFactory(new InMemoryRecordSourceFactory(articles(4)), { failOpenAt: 3 });
    const { engine, events } = createEngine({ source, threadCount: 3 });

    const error = await runError(engine);

    expect(error.operation).toBe('open-archive');
    expect(source.closed).toBe(2);
    expect(events.some((event) => event.type === 'batch:queued')).toBe(false);
    expect(events.some((event) => event.type === 'worker:started')).toBe(false);
  });

  it('should fail with prepare-output when the output location cannot be created', async () => {
    const sink: ShardSink = {
      prepare: () => Promise.reject(new Error('EACCES: permission denied')),
      open: () => Promise.reject(new Error('not prepared')),
    };
    const { engine } = createEngine({ sink });

    const error = await runError(engine);

    expect(error.operation).toBe('prepare-output');
    expect(error.message).toBe('prepare-output failed: EACCES: permission denied');
  });
});

describe('Unwritable shards', () => {
  it('should fail with write-shard and discard the shard', async () => {
    const discard = vi.fn(() => Promise.resolve());
    const writer: ShardWriter = {
      write: () => Promise.reject(new Error('ENOSPC: no space left on device')),
      close: () => Promise.resolve(),
      discard,
    };
    const sink: ShardSink = {
      prepare: () => Promise.resolve(),
      open: () => Promise.resolve(writer),
    };
    const { engine } = createEngine({ sink });

    const error = await runError(engine);

    expect(error.operation).toBe('write-shard');
    expect(error.context).toEqual({ shardId: 1, workerId: 'writer-1', fileName: '0001.htmls.gz', recordIndex: 0 });
    expect(discard).toHaveBeenCalledOnce();
  });

  it('should report a shard that could not be removed', async () => {
    const writer: ShardWriter = {
      write: () => Promise.resolve(),
      close: () => Promise.reject(new Error('flush failed')),
      discard: () => Promise.reject(new Error('unlink failed')),
    };
    const sink: ShardSink = {
      prepare: () => Promise.resolve(),
      open: () => Promise.resolve(writer),
    };
    const { engine } = createEngine({ sink });

    const error = await runError(engine);

    expect(error.operation).toBe('write-shard');
    expect(error.message).toBe('write-shard failed: flush failed (partial shard could not be removed)');
    expect(error.cause).toBeInstanceOf(AggregateError);
  });
});

describe('Aborting a run', () => {
  it('should stop writers, discard the partial shard and reject with aborted', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const source = new FaultySourceFactory(new InMemoryRecordSourceFactory(articles(4)), { gate });
    const { engine, sink, events } = createEngine({ source });
    const started = new Promise<void>((resolve) => {
      engine.on('shard:started', () => resolve());
    });

    const outcome = runError(engine);
    await started;
    const aborting = engine.abort('Interrupted by user');
    release();
    await aborting;
    const error = await outcome;

    expect(error.operation).toBe('aborted');
    expect(error.message).toBe('Interrupted by user');
    expect(engine.getStatus().status).toBe('ABORTED');
    expect(sink.fileNames()).toEqual([]);
    expect(events.filter((event) => event.type === 'run:aborted')).toHaveLength(1);
    expect(events.some((event) => event.type === 'run:failed')).toBe(false);
    expect(source.closed).toBe(source.opened);
  });

  it('should ignore abort when no run is in progress', async () => {
    const { engine, events } = createEngine({});

    await engine.abort();

    expect(engine.getStatus().status).toBe('CREATED');
    expect(events).toEqual([]);
  });
});
