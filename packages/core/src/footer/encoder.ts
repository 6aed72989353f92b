// packages/core/src/footer/encoder.ts
import { FOOTER_MAGIC } from '../header/constants.js';
import { MANDATORY_FOOTER_SIZE, RESERVED } from '../config/defaults.js';
import { FooterEncodingError } from '../errors/index.js';

/**
 * Mandatory footer, 28 bytes little-endian, always the last bytes written:
 *   "TRAC" | u64 reserved | u64 optional footer position | u64 optional footer length
 */
export function encodeFooter(optionalPosition: number, optionalLength: number): Uint8Array {
  const footer = new Uint8Array(MANDATORY_FOOTER_SIZE);
  const view   = new DataView(footer.buffer);
  let off = 0;

  footer.set(FOOTER_MAGIC, off);                          off += FOOTER_MAGIC.byteLength;
  view.setBigUint64(off, RESERVED, true);                 off += 8;
  view.setBigUint64(off, BigInt(optionalPosition), true); off += 8;
  view.setBigUint64(off, BigInt(optionalLength), true);   off += 8;

  if (off !== MANDATORY_FOOTER_SIZE) {
    throw new FooterEncodingError(`Mandatory footer built with ${off} bytes, expected ${MANDATORY_FOOTER_SIZE}`);
  }
  return footer;
}
