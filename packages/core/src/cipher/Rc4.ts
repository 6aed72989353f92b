// packages/core/src/cipher/Rc4.ts
import { DEFAULT_KEY, KEY_LENGTH } from '../config/defaults.js';
import { InvalidKeyLengthError } from '../errors/index.js';

/**
 * RC4 keystream. CaRT uses it to neuter content, not to protect it:
 * the default key is public and there is no integrity check.
 *
 * The keystream runs on across calls to `apply`, so one instance must see
 * a section's bytes in order.
 */
export class Rc4 {
  private readonly s = new Uint8Array(256);
  private i = 0;
  private j = 0;

  constructor(key: Uint8Array) {
    if (key.byteLength < 1 || key.byteLength > 256) {
      throw new InvalidKeyLengthError(`RC4 key must be 1..256 bytes, got ${key.byteLength}`);
    }
    const s = this.s;
    for (let n = 0; n < 256; n++) s[n] = n;
    let j = 0;
    for (let n = 0; n < 256; n++) {
      j = (j + s[n] + key[n % key.byteLength]) & 0xff;
      const t = s[n]; s[n] = s[j]; s[j] = t;
    }
  }

  /**
   * XOR `input` with the next `input.length` keystream bytes into `output`
   * (a fresh array when omitted). `output` may be `input` itself.
   */
  apply(input: Uint8Array, output: Uint8Array = new Uint8Array(input.byteLength)): Uint8Array {
    if (output.byteLength < input.byteLength) {
      throw new RangeError('RC4 output buffer smaller than input');
    }
    const s = this.s;
    let { i, j } = this;
    for (let n = 0; n < input.byteLength; n++) {
      i = (i + 1) & 0xff;
      j = (j + s[i]) & 0xff;
      const t = s[i]; s[i] = s[j]; s[j] = t;
      output[n] = input[n] ^ s[(s[i] + s[j]) & 0xff];
    }
    this.i = i;
    this.j = j;
    return output;
  }
}

/** One-shot transform of a whole block with a fresh keystream. */
export function rc4Transform(key: Uint8Array, data: Uint8Array): Uint8Array {
  return new Rc4(key).apply(data);
}

export interface ResolvedKey {
  key: Uint8Array;
  overridden: boolean;
}

/** Pick the override when given (it must be exactly 16 bytes), else the default key. */
export function resolveKey(override?: Uint8Array | null): ResolvedKey {
  if (override == null) return { key: Uint8Array.from(DEFAULT_KEY), overridden: false };
  assertKey(override);
  return { key: Uint8Array.from(override), overridden: true };
}

export function assertKey(key: Uint8Array): void {
  if (key.byteLength !== KEY_LENGTH) {
    throw new InvalidKeyLengthError(`RC4 key must be ${KEY_LENGTH} bytes, got ${key.byteLength}`);
  }
}
