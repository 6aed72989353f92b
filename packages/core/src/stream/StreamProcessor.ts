// packages/core/src/stream/StreamProcessor.ts
import { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { constants as zlibConstants, createDeflate, createInflate } from 'node:zlib';
import type { ByteSink, ByteSource } from '../types/index.js';
import type { Digester } from '../digest/Digester.js';
import type { CipherSink } from './CipherSink.js';
import type { CipherSource } from './CipherSource.js';
import { CartError, StreamCipherError, toIOFailure } from '../errors/index.js';
import { DEFAULT_BLOCK_SIZE } from '../config/defaults.js';
import { createLogger, type Logger } from '../util/logger.js';

export interface CompressResult {
  /** Plaintext bytes read from the source. */
  bytesIn  : number;
  /** Compressed bytes handed to the cipher sink. */
  bytesOut : number;
}

export interface DecompressResult {
  /** Compressed bytes the inflater consumed. */
  consumed   : number;
  /** Bytes of the last raw read the inflater did not consume. */
  unconsumed : number;
  /** Plaintext bytes written to the sink. */
  written    : number;
}

// zlib refuses smaller output chunks
const MIN_ZLIB_CHUNK = 64;

/** Resolve once `chunk` has been processed; reject if the stream dies first. */
function writeChunk(stream: Writable, chunk: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    const onClose = (): void => reject(new Error('Decompressor closed before input was processed'));
    stream.once('close', onClose);
    stream.write(chunk, err => {
      stream.off('close', onClose);
      if (err) reject(err);
      else resolve();
    });
  });
}

function bodyError(err: unknown): CartError {
  if (err instanceof CartError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new StreamCipherError(`The file body stream is corrupted or unreadable: ${msg}`, { cause: err });
}

/**
 * The compression layer: zlib (fast mode) on top of the cipher adapters,
 * streamed in fixed-size blocks in both directions.
 */
export class StreamProcessor {
  private readonly log: Logger;

  constructor(
    private readonly blockSize = DEFAULT_BLOCK_SIZE,
    log?: Logger,
  ) {
    this.log = log ?? createLogger(0, () => {});
  }

  getBlockSize(): number { return this.blockSize; }

  /**
   * Read `source` to EOF in blocks, feed each block to every digester (in
   * order) and then to the compressor, whose output goes to `out`.
   * Resolves after the compressor has been finished.
   */
  async compress(
    source: ByteSource,
    out: CipherSink,
    digesters: readonly Digester[],
  ): Promise<CompressResult> {
    const blockSize = this.blockSize;
    const log       = this.log;
    const startOut  = out.bytesWritten;
    let bytesIn     = 0;

    async function* blocks(): AsyncGenerator<Uint8Array> {
      const buf = new Uint8Array(blockSize);
      for (;;) {
        let n: number;
        try {
          n = await source.read(buf);
        } catch (err) {
          throw toIOFailure(err, 'Reading input');
        }
        if (n === 0) return;
        const block = buf.slice(0, n);
        for (const d of digesters) d.update(block);
        bytesIn += n;
        log.log(4, `Input block of ${n} bytes`);
        yield block;
      }
    }

    const deflater = createDeflate({
      level: zlibConstants.Z_BEST_SPEED,
      chunkSize: Math.max(blockSize, MIN_ZLIB_CHUNK),
    });
    const cipherOut = new Writable({
      write(chunk: Uint8Array, _enc, cb) {
        out.write(chunk).then(() => cb(), cb);
      },
    });

    try {
      await pipeline(blocks(), deflater, cipherOut);
    } catch (err) {
      throw bodyError(err);
    }
    return { bytesIn, bytesOut: out.bytesWritten - startOut };
  }

  /**
   * Inflate from `input` into `sink` until the zlib stream ends. Bytes read
   * past that end stay with `input` (see CipherSource.takeRemaining).
   */
  async decompress(input: CipherSource, sink: ByteSink): Promise<DecompressResult> {
    const inflater = createInflate({ chunkSize: Math.max(this.blockSize, MIN_ZLIB_CHUNK) });
    const blockSize = this.blockSize;
    const log = this.log;
    let fed = 0;
    let written = 0;

    const feed = async (): Promise<void> => {
      const block = new Uint8Array(blockSize);
      try {
        for (;;) {
          const n = await input.read(block);
          if (n === 0) break;
          fed += n;
          try {
            await writeChunk(inflater, block.slice(0, n));
          } catch (err) {
            // the inflater closes itself once its stream has ended
            if (inflater.bytesWritten < fed) return;
            throw err;
          }
          // zlib stops consuming at the end of its stream; the rest is footer
          if (inflater.bytesWritten < fed) return;
        }
        inflater.end();
      } catch (err) {
        inflater.destroy();
        throw err;
      }
    };

    const drain = async (): Promise<void> => {
      for await (const chunk of inflater) {
        const block: Uint8Array = chunk;
        try {
          await sink.write(block);
        } catch (err) {
          throw toIOFailure(err, 'Writing output');
        }
        written += block.byteLength;
        log.log(4, `Output block of ${block.byteLength} bytes`);
      }
    };

    const [fedResult, drainResult] = await Promise.allSettled([feed(), drain()]);
    inflater.destroy();

    const failures: unknown[] = [];
    if (drainResult.status === 'rejected') failures.push(drainResult.reason);
    if (fedResult.status === 'rejected')   failures.push(fedResult.reason);
    if (failures.length) {
      throw bodyError(failures.find(e => e instanceof CartError) ?? failures[0]);
    }

    const consumed = inflater.bytesWritten;
    return { consumed, unconsumed: fed - consumed, written };
  }
}
