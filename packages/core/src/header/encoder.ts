// packages/core/src/header/encoder.ts
import { HEADER_MAGIC } from './constants.js';
import { KEY_LENGTH, MAJOR_VERSION, MANDATORY_HEADER_SIZE, RESERVED } from '../config/defaults.js';
import { HeaderEncodingError } from '../errors/index.js';

/**
 * Mandatory header, 38 bytes little-endian:
 *   "CART" | i16 version | u64 reserved | 16B key | u64 optional header length
 *
 * An overridden key is written as zeros so it never lands in the file.
 */
export function encodeHeader(
  key: Uint8Array,
  keyOverridden: boolean,
  optionalHeaderLength: number,
): Uint8Array {
  if (key.byteLength !== KEY_LENGTH) {
    throw new HeaderEncodingError(`Header key must be ${KEY_LENGTH} bytes`);
  }
  const header = new Uint8Array(MANDATORY_HEADER_SIZE);
  const view   = new DataView(header.buffer);
  let off = 0;

  header.set(HEADER_MAGIC, off);                 off += HEADER_MAGIC.byteLength;
  view.setInt16(off, MAJOR_VERSION, true);       off += 2;
  view.setBigUint64(off, RESERVED, true);        off += 8;
  if (!keyOverridden) header.set(key, off);
  off += KEY_LENGTH;
  view.setBigUint64(off, BigInt(optionalHeaderLength), true);
  off += 8;

  if (off !== MANDATORY_HEADER_SIZE) {
    throw new HeaderEncodingError(`Mandatory header built with ${off} bytes, expected ${MANDATORY_HEADER_SIZE}`);
  }
  return header;
}
