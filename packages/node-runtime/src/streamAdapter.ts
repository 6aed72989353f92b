import type { Readable, Writable } from 'node:stream';
import type { ByteSink, ByteSource } from '../../core/src/types/index.js';
import { IOFailureError, toIOFailure } from '../../core/src/errors/index.js';

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  throw new IOFailureError('Stream yielded a chunk that is neither bytes nor text');
}

/** Adapt any Node Readable (stdin, a socket, a file stream) to a ByteSource. */
export class ReadableByteSource implements ByteSource {
  private readonly it: AsyncIterator<unknown>;
  private pending: Uint8Array = new Uint8Array(0);
  private ended = false;

  constructor(readable: Readable) {
    this.it = readable[Symbol.asyncIterator]();
  }

  async read(into: Uint8Array): Promise<number> {
    if (into.byteLength === 0) return 0;
    while (this.pending.byteLength === 0) {
      if (this.ended) return 0;
      let next: IteratorResult<unknown>;
      try {
        next = await this.it.next();
      } catch (err) {
        throw toIOFailure(err, 'Reading stream');
      }
      if (next.done) {
        this.ended = true;
        return 0;
      }
      this.pending = toBytes(next.value);
    }
    const n = Math.min(into.byteLength, this.pending.byteLength);
    into.set(this.pending.subarray(0, n));
    this.pending = this.pending.subarray(n);
    return n;
  }
}

/**
 * Adapt a Node Writable to a ByteSink. Each write resolves once the stream
 * has taken the chunk, which also gives backpressure. `flush` leaves the
 * stream open, so stdout can be used as a sink.
 *
 * Stream errors (EPIPE on a closed stdout, say) are recorded by a listener
 * kept for the sink's lifetime and reported by the next write or flush.
 */
export class WritableByteSink implements ByteSink {
  private failure: Error | null = null;

  constructor(private readonly writable: Writable) {
    writable.on('error', (err: Error) => {
      this.failure ??= err;
    });
  }

  async write(chunk: Uint8Array): Promise<void> {
    this.assertOpen('Writing stream');
    await new Promise<void>((resolve, reject) => {
      this.writable.write(chunk, err => {
        if (err) reject(toIOFailure(err, 'Writing stream'));
        else resolve();
      });
    });
  }

  async flush(): Promise<void> {
    this.assertOpen('Flushing stream');
  }

  private assertOpen(what: string): void {
    const err = this.failure ?? this.writable.errored;
    if (err) throw toIOFailure(err, what);
    if (this.writable.destroyed || this.writable.writableEnded) {
      throw new IOFailureError(`${what} failed: stream is closed`);
    }
  }
}
