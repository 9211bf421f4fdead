import { describe, it, expect } from 'vitest';
import { InMemoryRecordSourceFactory, InMemoryShardSink, ShardEngine } from '@shardkit/core';
import type { InMemoryRecord, RecordSourceFactory } from '@shardkit/core';
import { createLogger } from '../../src/logger.js';
import { attachRunLogger } from '../../src/attachRunLogger.js';
import { collectLines } from '../support/collectLines.js';

const records: InMemoryRecord[] = [
  { index: 0, title: 'Duna', namespace: 'A', isRedirect: false, isDeleted: false, payload: '<p>Duna</p>' },
  { index: 1, title: 'Danube', namespace: 'A', isRedirect: true, isDeleted: false, payload: '' },
  { index: 2, title: 'Tisza', namespace: 'A', isRedirect: false, isDeleted: false, payload: '<p>Tisza</p>' },
];

function createEngine(source: RecordSourceFactory = new InMemoryRecordSourceFactory(records)) {
  return new ShardEngine({
    source,
    sink: new InMemoryShardSink(),
    filter: { namespace: 'A' },
    documentsPerShard: 2,
    threadCount: 1,
  });
}

describe('attachRunLogger', () => {
  it('should log the run lifecycle at info and per-entry events at debug', async () => {
    const { destination, lines } = collectLines();
    const engine = createEngine();
    attachRunLogger(engine, createLogger({ level: 'debug', destination }));

    await engine.run();

    const messages = lines.map((line) => line.msg);
    expect(messages[0]).toBe('Extraction started');
    expect(messages.at(-1)).toBe('Extraction completed');
    expect([...messages].sort()).toEqual([
      'Entry skipped',
      'Extraction completed',
      'Extraction started',
      'Scan completed',
      'Shard written',
      'Writer stopped',
    ]);
    expect(lines.every((line) => line['runId'] === engine.getRunId())).toBe(true);
    expect(lines.find((line) => line.msg === 'Entry skipped')).toMatchObject({
      level: 20,
      recordIndex: 1,
      title: 'Danube',
      reason: 'redirect',
    });
    expect(lines.at(-1)).toMatchObject({ level: 30, shardsWritten: 1, recordsWritten: 2 });
  });

  it('should leave out debug lines at info level', async () => {
    const { destination, lines } = collectLines();
    const engine = createEngine();
    attachRunLogger(engine, createLogger({ level: 'info', destination }));

    await engine.run();

    expect(lines.map((line) => line.msg)).toEqual(['Extraction started', 'Scan completed', 'Extraction completed']);
  });

  it('should log failures at error level', async () => {
    const { destination, lines } = collectLines();
    const failing: RecordSourceFactory = {
      open: () => Promise.reject(new Error('archive unreadable')),
      describe: () => ({ name: 'broken' }),
    };
    const engine = createEngine(failing);
    attachRunLogger(engine, createLogger({ level: 'info', destination }));

    await expect(engine.run()).rejects.toThrow('open-archive failed: archive unreadable');

    expect(lines.at(-1)).toMatchObject({
      level: 50,
      msg: 'Extraction failed',
      operation: 'open-archive',
      error: 'open-archive failed: archive unreadable',
    });
  });

  it('should stop logging once detached', async () => {
    const { destination, lines } = collectLines();
    const engine = createEngine();
    const detach = attachRunLogger(engine, createLogger({ level: 'debug', destination }));

    detach();
    await engine.run();

    expect(lines).toEqual([]);
  });
});
