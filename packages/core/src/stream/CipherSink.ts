// packages/core/src/stream/CipherSink.ts
import type { ByteSink } from '../types/index.js';
import { Rc4 } from '../cipher/Rc4.js';
import { toIOFailure } from '../errors/index.js';

/**
 * Encode-direction adapter: every chunk written is run through one
 * continuous keystream and forwarded to the wrapped sink.
 */
export class CipherSink implements ByteSink {
  private readonly cipher: Rc4;
  private written = 0;

  constructor(
    private readonly sink: ByteSink,
    key: Uint8Array,
  ) {
    this.cipher = new Rc4(key);
  }

  /** Bytes forwarded to the wrapped sink so far. */
  get bytesWritten(): number { return this.written; }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.byteLength === 0) return;
    // fresh scratch per chunk: the sink may hold on to what it is given
    const out = this.cipher.apply(chunk);
    try {
      await this.sink.write(out);
    } catch (err) {
      throw toIOFailure(err, 'Writing body');
    }
    this.written += out.byteLength;
  }

  async flush(): Promise<void> {
    try {
      await this.sink.flush();
    } catch (err) {
      throw toIOFailure(err, 'Flushing output');
    }
  }
}
