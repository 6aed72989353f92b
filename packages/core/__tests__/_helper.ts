import { createHash, randomBytes } from 'node:crypto';
import type { ByteSink, ByteSource } from '../src/types/index.js';

export const utf8 = (s: string): Uint8Array => new TextEncoder().encode(s);

export const hex = (u8: Uint8Array): string => Buffer.from(u8).toString('hex');

export const randomData = (n: number): Uint8Array => new Uint8Array(randomBytes(n));

export const nodeDigest = (algo: 'md5' | 'sha1' | 'sha256' | 'sha512', data: Uint8Array): string =>
  createHash(algo).update(data).digest('hex');

/** ByteSource that hands out at most `step` bytes per read. */
export class TrickleSource implements ByteSource {
  private offset = 0;
  constructor(private readonly data: Uint8Array, private readonly step: number) {}

  async read(into: Uint8Array): Promise<number> {
    const n = Math.min(into.byteLength, this.step, this.data.byteLength - this.offset);
    into.set(this.data.subarray(this.offset, this.offset + n));
    this.offset += n;
    return n;
  }
}

/** ByteSource that fills every read with 0x07 and fails after `okReads` reads. */
export class FailingSource implements ByteSource {
  private reads = 0;
  constructor(private readonly okReads: number) {}

  async read(into: Uint8Array): Promise<number> {
    if (this.reads++ >= this.okReads) throw new Error('disk on fire');
    into.fill(7);
    return into.byteLength;
  }
}

/** ByteSink that rejects every write after `okWrites` accepted ones. */
export class FailingSink implements ByteSink {
  private writes = 0;
  constructor(private readonly okWrites: number) {}

  async write(): Promise<void> {
    if (this.writes++ >= this.okWrites) throw new Error('pipe closed');
  }
  async flush(): Promise<void> {}
}
