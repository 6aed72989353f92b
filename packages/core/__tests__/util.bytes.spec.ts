import { concat, hexDecode, hexEncode } from '../src/util/bytes.js';
import { DecodingError } from '../src/errors/index.js';

describe('util/bytes helpers', () => {
  const a = new Uint8Array([1, 2, 3]);
  const b = new Uint8Array([4, 5]);

  it('concats arbitrary Uint8Arrays', () => {
    expect(Array.from(concat(a, b))).toEqual([1, 2, 3, 4, 5]);
    expect(concat().byteLength).toBe(0);
  });

  it('hex round-trips correctly', () => {
    expect(hexEncode(Uint8Array.of(0, 15, 255))).toBe('000fff');
    expect(Array.from(hexDecode('000FFF'))).toEqual([0, 15, 255]);
  });

  it('ignores surrounding whitespace', () => {
    expect(Array.from(hexDecode(' 0a0b\n'))).toEqual([10, 11]);
  });

  it('throws DecodingError on odd length', () => {
    expect(() => hexDecode('abc')).toThrow(DecodingError);
  });

  it('throws DecodingError on non-hex characters', () => {
    expect(() => hexDecode('zz')).toThrow(DecodingError);
  });
});
