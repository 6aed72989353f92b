import { PassThrough, Readable, Writable } from 'node:stream';
import { BufferSource, Cart, IOFailureError } from '../src/index.js';
import { ReadableByteSource, WritableByteSink } from '../src/streamAdapter.js';

describe('ReadableByteSource', () => {
  it('re-slices stream chunks to the caller buffer', async () => {
    const src = new ReadableByteSource(Readable.from([Buffer.from([1, 2, 3]), Buffer.from([4])]));
    const buf = new Uint8Array(2);
    const got: number[][] = [];
    for (let n = await src.read(buf); n > 0; n = await src.read(buf)) {
      got.push(Array.from(buf.subarray(0, n)));
    }
    expect(got).toEqual([[1, 2], [3], [4]]);
    expect(await src.read(buf)).toBe(0);
  });

  it('accepts text chunks as UTF-8', async () => {
    const src = new ReadableByteSource(Readable.from(['hé']));
    const buf = new Uint8Array(8);
    const n   = await src.read(buf);
    expect(Array.from(buf.subarray(0, n))).toEqual([0x68, 0xc3, 0xa9]);
  });

  it('refuses object chunks', async () => {
    const src = new ReadableByteSource(Readable.from([{ a: 1 }]));
    await expect(src.read(new Uint8Array(4))).rejects.toThrow(IOFailureError);
  });
});

describe('WritableByteSink', () => {
  it('carries a pack/unpack round trip over Node streams', async () => {
    const cart  = new Cart({ blockSize: 1024 });
    const data  = Buffer.alloc(50_000, 'abc');
    const pipe  = new PassThrough();
    const parts: Buffer[] = [];
    pipe.on('data', (c: Buffer) => parts.push(c));

    const sink = new WritableByteSink(pipe);
    await cart.pack(new ReadableByteSource(Readable.from([data])), sink);
    pipe.end();
    await new Promise(resolve => pipe.once('end', resolve));

    const out = await cart.unpackData(Buffer.concat(parts));
    expect(Buffer.from(out.body).equals(data)).toBe(true);
  });

  /** Writable whose every write fails asynchronously, like stdout after the reader went away. */
  const brokenPipe = (): Writable => new Writable({
    write(_chunk, _enc, cb) {
      setImmediate(() => cb(new Error('EPIPE')));
    },
  });

  it('rejects an asynchronously failing write and keeps failing', async () => {
    const w    = brokenPipe();
    const sink = new WritableByteSink(w);

    const first = await sink.write(Uint8Array.of(1)).catch((e: unknown) => e);
    expect(first).toBeInstanceOf(IOFailureError);
    expect(first).toHaveProperty('message', 'Writing stream failed: EPIPE');
    expect(w.destroyed).toBe(true);

    await expect(sink.write(Uint8Array.of(2))).rejects.toThrow('Writing stream failed: EPIPE');
    await expect(sink.flush()).rejects.toThrow('Flushing stream failed: EPIPE');
  });

  it('makes pack reject instead of hanging on a broken pipe', async () => {
    const sink = new WritableByteSink(brokenPipe());
    await expect(new Cart().pack(new BufferSource(Buffer.alloc(10_000, 1)), sink))
      .rejects.toThrow(IOFailureError);
  });

  it('refuses a destroyed stream', async () => {
    const pipe = new PassThrough();
    pipe.destroy();
    const sink = new WritableByteSink(pipe);
    await expect(new Cart().pack(new BufferSource(Uint8Array.of(1, 2, 3)), sink))
      .rejects.toThrow('Writing stream failed: stream is closed');
  });
});
