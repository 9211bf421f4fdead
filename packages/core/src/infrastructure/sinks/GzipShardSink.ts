import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { once } from 'node:events';
import { join, resolve } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGzip, constants } from 'node:zlib';
import type { ShardSink, ShardWriter } from '../../domain/ports/ShardSink.js';

export interface GzipShardSinkOptions {
  /** gzip compression level, 0–9. Default: zlib's default (6). */
  readonly level?: number;
}

/** Sink writing each shard as a gzip file in an output directory. Node.js only. */
export class GzipShardSink implements ShardSink {
  readonly outputDir: string;
  private readonly level: number;

  constructor(outputDir: string, options?: GzipShardSinkOptions) {
    this.outputDir = resolve(outputDir);
    this.level = options?.level ?? constants.Z_DEFAULT_COMPRESSION;
  }

  async prepare(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
  }

  async open(fileName: string): Promise<ShardWriter> {
    const filePath = join(this.outputDir, fileName);
    const gzip = createGzip({ level: this.level });
    const file = createWriteStream(filePath, { flags: 'w' });
    await once(file, 'open');

    let failure: Error | null = null;
    // Resolves with the stream error, or null; never rejects
    const done = pipeline(gzip, file).then(
      () => null,
      (error: unknown) => {
        failure = error instanceof Error ? error : new Error(String(error));
        return failure;
      },
    );

    return {
      async write(chunk: Uint8Array): Promise<void> {
        if (failure) throw failure;
        if (gzip.destroyed) throw new Error(`${fileName}: shard stream is closed`);
        if (!gzip.write(chunk)) {
          await once(gzip, 'drain');
        }
      },
      async close(): Promise<void> {
        gzip.end();
        const error = await done;
        if (error) throw error;
      },
      async discard(): Promise<void> {
        gzip.destroy();
        await done;
        await rm(filePath, { force: true });
      },
    };
  }
}
