import { createReadStream } from 'node:fs';
import { basename } from 'node:path';
import { createGunzip } from 'node:zlib';
import { describeDocumentCount, FrameDecoder } from '../../domain/services/FrameCodec.js';

/**
 * Stream the payloads of a shard file in the order they were written.
 * The file is closed when the consumer stops early.
 *
 * @throws Error naming the file and the number of complete documents when the
 * file is unreadable, its gzip stream is cut short, or it ends in the middle of a frame.
 */
export async function* readShard(filePath: string): AsyncIterable<Buffer> {
  const name = basename(filePath);
  const decoder = new FrameDecoder();
  const file = createReadStream(filePath);
  const stream = createGunzip();
  file.on('error', (error) => stream.destroy(error));
  file.pipe(stream);

  try {
    for await (const chunk of stream) {
      if (!Buffer.isBuffer(chunk)) {
        throw new Error('unexpected non-binary chunk');
      }
      yield* decoder.push(chunk);
    }
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`${name}: ${detail} after ${describeDocumentCount(decoder.count)}`, { cause: error });
  } finally {
    file.destroy();
    stream.destroy();
  }

  try {
    decoder.finish();
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`${name}: ${detail}`, { cause: error });
  }
}

/** Count the documents and payload bytes of a shard. */
export async function inspectShard(filePath: string): Promise<{ documents: number; payloadBytes: number }> {
  let documents = 0;
  let payloadBytes = 0;
  for await (const payload of readShard(filePath)) {
    documents++;
    payloadBytes += payload.length;
  }
  return { documents, payloadBytes };
}
