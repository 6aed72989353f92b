// packages/core/src/util/ByteSource.ts
import type { ByteSink, ByteSource } from '../types/index.js';
import { IOFailureError, toIOFailure } from '../errors/index.js';
import { concat } from './bytes.js';

/**
 * ByteSource over an in-memory buffer. Reads copy into the caller's array,
 * so the source data is never handed out by reference.
 */
export class BufferSource implements ByteSource {
  #offset = 0;

  constructor(private readonly data: Uint8Array) {}

  /** Bytes not yet read. */
  get remaining(): number { return this.data.byteLength - this.#offset; }

  async read(into: Uint8Array): Promise<number> {
    const n = Math.min(into.byteLength, this.remaining);
    into.set(this.data.subarray(this.#offset, this.#offset + n));
    this.#offset += n;
    return n;
  }
}

/**
 * ByteSink that collects everything written into one plain Uint8Array.
 * Chunks are copied on write, so callers may reuse their buffers.
 */
export class BufferSink implements ByteSink {
  #chunks: Uint8Array[] = [];
  #length = 0;
  #flushes = 0;

  async write(chunk: Uint8Array): Promise<void> {
    // Buffer#slice is a view; the Uint8Array constructor copies
    this.#chunks.push(new Uint8Array(chunk));
    this.#length += chunk.byteLength;
  }

  async flush(): Promise<void> { this.#flushes++; }

  get length(): number { return this.#length; }
  get flushCount(): number { return this.#flushes; }

  /** Everything written so far, as one array. */
  get bytes(): Uint8Array {
    if (this.#chunks.length !== 1) this.#chunks = [concat(...this.#chunks)];
    return this.#chunks[0];
  }
}

/**
 * Fill exactly `len` bytes from `source`. Running out early is an I/O
 * failure (the container was cut short inside a fixed field).
 */
export async function readExactly(
  source: ByteSource,
  len: number,
  what = 'data',
): Promise<Uint8Array> {
  const out = new Uint8Array(len);
  let filled = 0;
  while (filled < len) {
    let n: number;
    try {
      n = await source.read(out.subarray(filled));
    } catch (err) {
      throw toIOFailure(err, `Reading ${what}`);
    }
    if (n === 0) {
      throw new IOFailureError(`Unexpected end of stream reading ${what}: got ${filled} of ${len} bytes`);
    }
    filled += n;
  }
  return out;
}

/** Read until EOF or until more than `limit` bytes have arrived. */
export async function readToEnd(
  source: ByteSource,
  limit: number,
  blockSize: number,
): Promise<{ bytes: Uint8Array; overflow: boolean }> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  const block = new Uint8Array(blockSize);
  for (;;) {
    let n: number;
    try {
      n = await source.read(block);
    } catch (err) {
      throw toIOFailure(err, 'Reading trailing data');
    }
    if (n === 0) break;
    chunks.push(block.slice(0, n));
    total += n;
    if (total > limit) return { bytes: concat(...chunks), overflow: true };
  }
  return { bytes: concat(...chunks), overflow: false };
}
