import { encodeHeader } from '../src/header/encoder.js';
import { decodeHeader, decodeOptionalHeader, parseHeader } from '../src/header/decoder.js';
import { resolveKey } from '../src/cipher/Rc4.js';
import { encodeMetadata } from '../src/metadata/codec.js';
import { BufferSource } from '../src/util/ByteSource.js';
import {
  HeaderCorruptError,
  HeaderEncodingError,
  IOFailureError,
  InvalidKeyLengthError,
} from '../src/errors/index.js';
import { concat } from '../src/util/bytes.js';
import { hex } from './_helper.js';

const { key: DEFAULT } = resolveKey();
const CUSTOM = new Uint8Array(16).fill(0xab);

describe('mandatory header encoder', () => {
  it('lays out magic, version, reserved, key and length little-endian', () => {
    expect(hex(encodeHeader(DEFAULT, false, 0))).toBe(
      '43415254' + '0100' + '0000000000000000' +
      '03010401050902060301040105090206' + '0000000000000000',
    );
  });

  it('zeroes the key slot when the key was overridden', () => {
    const buf = encodeHeader(CUSTOM, true, 300);
    expect(hex(buf.subarray(14, 30))).toBe('00'.repeat(16));
    expect(hex(buf.subarray(30))).toBe('2c01000000000000');
  });

  it('refuses a key of the wrong size', () => {
    expect(() => encodeHeader(new Uint8Array(15), false, 0)).toThrow(HeaderEncodingError);
  });
});

describe('mandatory header decoder', () => {
  it('round-trips key and optional header length', () => {
    const hdr = parseHeader(encodeHeader(DEFAULT, false, 5));
    expect(hdr.optionalHeaderLength).toBe(5);
    expect(hdr.key).toEqual(DEFAULT);
    expect(hdr.storedKey).toEqual(DEFAULT);
    expect(hdr.bytesRead).toBe(38);
  });

  it('uses the override instead of the stored (zeroed) key', () => {
    const hdr = parseHeader(encodeHeader(CUSTOM, true, 0), CUSTOM);
    expect(hdr.key).toEqual(CUSTOM);
    expect(hdr.storedKey).toEqual(new Uint8Array(16));
  });

  it('rejects an override of the wrong size', () => {
    expect(() => parseHeader(encodeHeader(DEFAULT, false, 0), new Uint8Array(8)))
      .toThrow(InvalidKeyLengthError);
  });

  it.each([
    ['magic',    0, 0x44],
    ['version',  4, 0x02],
    ['reserved', 6, 0x01],
  ])('rejects a bad %s', (_label, offset, value) => {
    const buf = encodeHeader(DEFAULT, false, 0);
    buf[offset] = value;
    expect(() => parseHeader(buf)).toThrow(HeaderCorruptError);
  });

  it('rejects an optional header length above the limit', () => {
    expect(() => parseHeader(encodeHeader(DEFAULT, false, 101), null, 100))
      .toThrow(HeaderCorruptError);
    expect(parseHeader(encodeHeader(DEFAULT, false, 100), null, 100).optionalHeaderLength).toBe(100);
  });

  it('reports a short read as an I/O failure', async () => {
    const cut = encodeHeader(DEFAULT, false, 0).subarray(0, 20);
    await expect(decodeHeader(new BufferSource(cut))).rejects.toThrow(IOFailureError);
  });

  it('reads the optional header that follows', async () => {
    const opt    = encodeMetadata({ name: 'sample.exe' }, DEFAULT);
    const source = new BufferSource(concat(encodeHeader(DEFAULT, false, opt.byteLength), opt));
    const hdr    = await decodeHeader(source);
    expect(await decodeOptionalHeader(source, hdr.key, hdr.optionalHeaderLength))
      .toEqual({ name: 'sample.exe' });
  });
});
