/** Size of the big-endian length prefix in front of every payload. */
export const FRAME_HEADER_BYTES = 4;

/** Largest payload a 32-bit length prefix can describe. */
export const MAX_FRAME_PAYLOAD = 0xffffffff;

/** Frame a payload: 4-byte unsigned big-endian length followed by the bytes themselves. */
export function encodeFrame(payload: Uint8Array): Buffer {
  if (payload.length > MAX_FRAME_PAYLOAD) {
    throw new Error(`Payload of ${String(payload.length)} bytes does not fit a 32-bit frame`);
  }
  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
  frame.writeUInt32BE(payload.length, 0);
  frame.set(payload, FRAME_HEADER_BYTES);
  return frame;
}

/** `1 complete document`, `3 complete documents`. */
export function describeDocumentCount(count: number): string {
  return `${String(count)} complete ${count === 1 ? 'document' : 'documents'}`;
}

/**
 * Incremental decoder for a stream of frames.
 *
 * Chunks may split a frame (or its header) at any byte; `push()` returns every
 * payload completed by the new chunk, in order. Incoming chunks are buffered
 * as a list and joined once a whole frame is available.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private decoded = 0;

  /** Number of complete payloads decoded so far. */
  get count(): number {
    return this.decoded;
  }

  push(chunk: Uint8Array): Buffer[] {
    if (chunk.length > 0) {
      this.chunks.push(Buffer.from(chunk));
      this.buffered += chunk.length;
    }

    const size = this.nextFrameSize();
    if (size === undefined || this.buffered < FRAME_HEADER_BYTES + size) return [];

    const [first] = this.chunks;
    const data = this.chunks.length === 1 && first ? first : Buffer.concat(this.chunks, this.buffered);
    const payloads: Buffer[] = [];
    let offset = 0;

    while (data.length - offset >= FRAME_HEADER_BYTES) {
      const end = offset + FRAME_HEADER_BYTES + data.readUInt32BE(offset);
      if (end > data.length) break;
      payloads.push(data.subarray(offset + FRAME_HEADER_BYTES, end));
      offset = end;
    }

    const rest = data.subarray(offset);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    this.decoded += payloads.length;
    return payloads;
  }

  /** Assert the stream ended on a frame boundary. */
  finish(): void {
    if (this.buffered > 0) {
      throw new Error(
        `Stream ended abruptly after ${describeDocumentCount(this.decoded)} (${String(this.buffered)} trailing bytes)`,
      );
    }
  }

  private nextFrameSize(): number | undefined {
    if (this.buffered < FRAME_HEADER_BYTES) return undefined;
    const [first] = this.chunks;
    if (first && first.length >= FRAME_HEADER_BYTES) return first.readUInt32BE(0);
    // Header split across chunks: join the (short) buffered prefix once.
    const joined = Buffer.concat(this.chunks, this.buffered);
    this.chunks = [joined];
    return joined.readUInt32BE(0);
  }
}

/** Decode a complete, uncompressed frame sequence. */
export function decodeFrames(data: Uint8Array): Buffer[] {
  const decoder = new FrameDecoder();
  const payloads = decoder.push(data);
  decoder.finish();
  return payloads;
}
