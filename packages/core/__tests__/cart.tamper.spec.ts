import { Cart } from '../src/index.js';
import { concat } from '../src/util/bytes.js';
import {
  FooterCorruptError,
  HeaderCorruptError,
  MetadataCodecError,
  StreamCipherError,
} from '../src/errors/index.js';
import { randomData } from './_helper.js';

function flipBit(buf: Uint8Array, i: number): Uint8Array {
  const out = buf.slice();
  out[i] ^= 0x80;
  return out;
}

function setU64(buf: Uint8Array, offset: number, value: bigint): Uint8Array {
  const out = buf.slice();
  new DataView(out.buffer).setBigUint64(offset, value, true);
  return out;
}

describe('Cart - container integrity guard', () => {
  const cart = new Cart();
  let packed: Uint8Array;
  let optHeaderLen: number;
  let footerStart: number;

  beforeAll(async () => {
    packed = await cart.packData(randomData(4000), { header: { name: 'sample' } });
    const view   = new DataView(packed.buffer, packed.byteOffset);
    optHeaderLen = Number(view.getBigUint64(30, true));
    footerStart  = Number(view.getBigUint64(packed.byteLength - 16, true));
  });

  it('rejects a damaged header magic', async () => {
    await expect(cart.unpackData(flipBit(packed, 1))).rejects.toThrow(HeaderCorruptError);
  });

  it('rejects an unknown version', async () => {
    const bad = packed.slice();
    bad[4] = 2;
    await expect(cart.unpackData(bad)).rejects.toThrow('Unsupported CaRT version 2');
  });

  it('rejects an absurd optional header length', async () => {
    await expect(cart.unpackData(setU64(packed, 30, 1n << 40n))).rejects.toThrow(HeaderCorruptError);
  });

  it('rejects a damaged optional header', async () => {
    await expect(cart.unpackData(flipBit(packed, 38 + 1))).rejects.toThrow(MetadataCodecError);
  });

  it('rejects a damaged body', async () => {
    await expect(cart.unpackData(flipBit(packed, 38 + optHeaderLen + 100)))
      .rejects.toThrow(StreamCipherError);
  });

  it('rejects a damaged optional footer', async () => {
    await expect(cart.unpackData(flipBit(packed, footerStart + 2))).rejects.toThrow(MetadataCodecError);
  });

  it('rejects a damaged footer magic', async () => {
    await expect(cart.unpackData(flipBit(packed, packed.byteLength - 28)))
      .rejects.toThrow(FooterCorruptError);
  });

  it('rejects an optional footer length larger than the data', async () => {
    await expect(cart.unpackData(setU64(packed, packed.byteLength - 8, 1n << 60n)))
      .rejects.toThrow(FooterCorruptError);
  });

  it('rejects data appended after the footer', async () => {
    await expect(cart.unpackData(concat(packed, Uint8Array.of(0))))
      .rejects.toThrow(FooterCorruptError);
  });

  it('rejects a second container glued on', async () => {
    await expect(cart.unpackData(concat(packed, packed))).rejects.toThrow(FooterCorruptError);
  });

  it('tolerates a wrong optional footer position but logs it', async () => {
    const lines: string[] = [];
    const chatty = new Cart({ verbose: 2, logger: m => lines.push(m) });
    const moved  = setU64(packed, packed.byteLength - 16, 7n);
    const out    = await chatty.unpackData(moved);
    expect(out.footer?.length).toBe('4000');
    expect(lines).toContain(`2| Optional footer recorded at 7, found at ${footerStart}`);
  });
});
