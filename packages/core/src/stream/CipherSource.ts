// packages/core/src/stream/CipherSource.ts
import type { ByteSource } from '../types/index.js';
import { Rc4 } from '../cipher/Rc4.js';
import { CartError, FooterCorruptError, StreamCipherError, toIOFailure } from '../errors/index.js';
import { DEFAULT_BLOCK_SIZE } from '../config/defaults.js';
import { concat } from '../util/bytes.js';
import { readToEnd } from '../util/ByteSource.js';

/**
 * Decode-direction adapter: reads raw bytes from the wrapped source and
 * hands them out deciphered.
 *
 * The raw bytes of the most recent read are kept. The decompressor stops
 * somewhere inside that chunk, and whatever it left unconsumed belongs to
 * the footer; `takeRemaining` hands those bytes back once, together with
 * anything the source still holds.
 */
export class CipherSource implements ByteSource {
  private readonly cipher: Rc4;
  private scratch = new Uint8Array(0);
  private last = new Uint8Array(0);
  private total = 0;
  private taken = false;

  constructor(
    private readonly source: ByteSource,
    key: Uint8Array,
    private readonly blockSize = DEFAULT_BLOCK_SIZE,
  ) {
    this.cipher = new Rc4(key);
  }

  /** Raw bytes read from the wrapped source so far. */
  get bytesRead(): number { return this.total; }

  async read(into: Uint8Array): Promise<number> {
    if (this.taken) throw new CartError('CipherSource used after takeRemaining()');
    if (this.scratch.byteLength < into.byteLength) this.scratch = new Uint8Array(into.byteLength);

    let n: number;
    try {
      n = await this.source.read(this.scratch.subarray(0, into.byteLength));
    } catch (err) {
      throw toIOFailure(err, 'Reading body');
    }
    if (n === 0) return 0;

    this.last = this.scratch.slice(0, n);
    this.cipher.apply(this.last, into);
    this.total += n;
    return n;
  }

  /**
   * Close the adapter and return the raw bytes past the end of the body:
   * the last `unconsumed` bytes of the most recent read followed by the
   * rest of the source, capped at `limit` bytes.
   */
  async takeRemaining(unconsumed: number, limit: number): Promise<Uint8Array> {
    if (this.taken) throw new CartError('takeRemaining() called twice');
    this.taken = true;

    if (unconsumed < 0 || unconsumed > this.last.byteLength) {
      throw new StreamCipherError(
        `Decompressor left ${unconsumed} bytes unconsumed but the last read held ${this.last.byteLength}`,
      );
    }
    const head = this.last.subarray(this.last.byteLength - unconsumed);
    if (head.byteLength > limit) {
      throw new FooterCorruptError(`Trailing data exceeds ${limit} bytes`);
    }
    const rest = await readToEnd(this.source, limit - head.byteLength, this.blockSize);
    if (rest.overflow) {
      throw new FooterCorruptError(`Trailing data exceeds ${limit} bytes`);
    }
    this.last = new Uint8Array(0);
    return rest.bytes.byteLength ? concat(head, rest.bytes) : head.slice();
  }
}
