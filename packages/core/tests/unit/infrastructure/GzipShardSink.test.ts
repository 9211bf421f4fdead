import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { gunzipSync, gzipSync } from 'node:zlib';
import { GzipShardSink } from '../../../src/infrastructure/sinks/GzipShardSink.js';
import { readShard, inspectShard } from '../../../src/infrastructure/readers/readShard.js';
import { encodeFrame } from '../../../src/domain/services/FrameCodec.js';

let testDir: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'shardkit-test-gzipsink-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

async function readAll(filePath: string): Promise<string[]> {
  const payloads: string[] = [];
  for await (const payload of readShard(filePath)) {
    payloads.push(payload.toString('utf-8'));
  }
  return payloads;
}

describe('GzipShardSink', () => {
  it('should create the output directory recursively on prepare', async () => {
    const outputDir = join(testDir, 'nested', 'out');
    const sink = new GzipShardSink(outputDir);

    await sink.prepare();

    expect(existsSync(outputDir)).toBe(true);
  });

  it('should write frames as a gzip stream', async () => {
    const sink = new GzipShardSink(testDir);
    await sink.prepare();

    const writer = await sink.open('0001.htmls.gz');
    await writer.write(encodeFrame(Buffer.from('<p>one</p>')));
    await writer.write(encodeFrame(Buffer.from('<p>two</p>')));
    await writer.close();

    const raw = gunzipSync(readFileSync(join(testDir, '0001.htmls.gz')));
    expect(raw).toEqual(Buffer.concat([encodeFrame(Buffer.from('<p>one</p>')), encodeFrame(Buffer.from('<p>two</p>'))]));
  });

  it('should truncate an existing shard file', async () => {
    writeFileSync(join(testDir, '0002.htmls.gz'), 'stale contents');
    const sink = new GzipShardSink(testDir);
    await sink.prepare();

    const writer = await sink.open('0002.htmls.gz');
    await writer.write(encodeFrame(Buffer.from('fresh')));
    await writer.close();

    expect(await readAll(join(testDir, '0002.htmls.gz'))).toEqual(['fresh']);
  });

  it('should remove the file on discard', async () => {
    const sink = new GzipShardSink(testDir);
    await sink.prepare();

    const writer = await sink.open('0003.htmls.gz');
    await writer.write(encodeFrame(Buffer.from('partial')));
    await writer.discard();

    expect(readdirSync(testDir)).toEqual([]);
  });

  it('should reject writes after discard', async () => {
    const sink = new GzipShardSink(testDir);
    await sink.prepare();

    const writer = await sink.open('0004.htmls.gz');
    await writer.discard();

    await expect(writer.write(encodeFrame(Buffer.from('late')))).rejects.toThrow();
  });

  it('should honour stream backpressure for large shards', async () => {
    const sink = new GzipShardSink(testDir, { level: 1 });
    await sink.prepare();
    const payload = Buffer.alloc(256 * 1024, 0x61);

    const writer = await sink.open('0005.htmls.gz');
    for (let i = 0; i < 16; i++) {
      await writer.write(encodeFrame(payload));
    }
    await writer.close();

    expect(await inspectShard(join(testDir, '0005.htmls.gz'))).toEqual({
      documents: 16,
      payloadBytes: 16 * 256 * 1024,
    });
  });
});

describe('readShard', () => {
  it('should yield payloads in write order', async () => {
    const filePath = join(testDir, '0001.htmls.gz');
    const frames = ['alpha', 'béta', ''].map((text) => encodeFrame(Buffer.from(text)));
    writeFileSync(filePath, gzipSync(Buffer.concat(frames)));

    expect(await readAll(filePath)).toEqual(['alpha', 'béta', '']);
  });

  it('should read an empty shard as zero documents', async () => {
    const filePath = join(testDir, '0001.htmls.gz');
    writeFileSync(filePath, gzipSync(Buffer.alloc(0)));

    expect(await inspectShard(filePath)).toEqual({ documents: 0, payloadBytes: 0 });
  });

  it('should reject a shard that ends inside a frame', async () => {
    const filePath = join(testDir, '0007.htmls.gz');
    const complete = encodeFrame(Buffer.from('complete'));
    const truncated = encodeFrame(Buffer.from('truncated')).subarray(0, 7);
    writeFileSync(filePath, gzipSync(Buffer.concat([complete, truncated])));

    await expect(readAll(filePath)).rejects.toThrow(
      '0007.htmls.gz: Stream ended abruptly after 1 complete document (7 trailing bytes)',
    );
  });

  it('should reject a shard whose gzip stream is cut short', async () => {
    const filePath = join(testDir, '0042.htmls.gz');
    const frames = [Buffer.alloc(5000, 0x61), Buffer.alloc(5000, 0x62)].map((payload) => encodeFrame(payload));
    const compressed = gzipSync(Buffer.concat(frames));
    writeFileSync(filePath, compressed.subarray(0, compressed.length - 10));

    await expect(readAll(filePath)).rejects.toThrow(
      /^0042\.htmls\.gz: unexpected end of file after [0-2] complete documents?$/,
    );
  });

  it('should reject a missing file', async () => {
    await expect(readAll(join(testDir, 'missing.htmls.gz'))).rejects.toThrow(
      /^missing\.htmls\.gz: ENOENT: .* after 0 complete documents$/,
    );
  });
});
