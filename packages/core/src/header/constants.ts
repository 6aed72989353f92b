// packages/core/src/header/constants.ts
export const HEADER_MAGIC = Uint8Array.of(0x43, 0x41, 0x52, 0x54); // "CART"
export const FOOTER_MAGIC = Uint8Array.of(0x54, 0x52, 0x41, 0x43); // "TRAC"

export function hasMagic(buf: Uint8Array, magic: Uint8Array, offset = 0): boolean {
  if (buf.byteLength - offset < magic.byteLength) return false;
  for (let i = 0; i < magic.byteLength; i++) {
    if (buf[offset + i] !== magic[i]) return false;
  }
  return true;
}
