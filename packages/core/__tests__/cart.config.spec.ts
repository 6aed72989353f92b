/* ------------------------------------------------------------------
   Runtime-configuration edge cases
   ------------------------------------------------------------------ */
import { Cart } from '../src/index.js';

describe('Cart configuration guards', () => {

  const cart = new Cart();

  /* ── block-size validation ─────────────────────────────────────── */
  it.each([0, -1, 3.14, NaN, Infinity, 16 * 1024 * 1024 + 1])(
    'setBlockSize(%p) → throws',
    bad => {
      expect(() => cart.setBlockSize(bad)).toThrow(RangeError);
    },
  );

  it('defaults to 64 KiB blocks and accepts changes', () => {
    expect(new Cart().getBlockSize()).toBe(65_536);
    const c = new Cart({ blockSize: 1024 });
    expect(c.getBlockSize()).toBe(1024);
    c.setBlockSize(16 * 1024 * 1024);
    expect(c.getBlockSize()).toBe(16 * 1024 * 1024);
  });

  it('validates the constructor options', () => {
    expect(() => new Cart({ blockSize: 0 })).toThrow(RangeError);
    expect(() => new Cart({ maxMetadataBytes: -1 })).toThrow(RangeError);
  });

  it('applies a verbosity change to later operations', async () => {
    const lines: string[] = [];
    const c = new Cart({ logger: m => lines.push(m) });
    expect(c.getVerbose()).toBe(0);
    await c.packData(new Uint8Array(1));
    expect(lines).toEqual([]);

    c.setVerbose(1);
    await c.packData(new Uint8Array(1));
    expect(lines).toEqual(['1| Start packing, block size: 65536', '1| Packing finished']);
  });

  it('enforces the metadata size limit when unpacking', async () => {
    const packed = await cart.packData(new Uint8Array(0), { header: { blob: 'x'.repeat(200) } });
    await expect(new Cart({ maxMetadataBytes: 100 }).unpackData(packed))
      .rejects.toThrow('exceeds limit of 100 bytes');
  });

  it('enforces the metadata size limit on the trailing data', async () => {
    const packed = await cart.packData(new Uint8Array(0), { footer: { blob: 'x'.repeat(200) } });
    await expect(new Cart({ maxMetadataBytes: 100 }).unpackData(packed))
      .rejects.toThrow('Trailing data exceeds 128 bytes');
  });
});
