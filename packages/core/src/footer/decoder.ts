// packages/core/src/footer/decoder.ts
import { FOOTER_MAGIC, hasMagic } from '../header/constants.js';
import { MANDATORY_FOOTER_SIZE, RESERVED } from '../config/defaults.js';
import { FooterCorruptError } from '../errors/index.js';
import { decodeMetadata } from '../metadata/codec.js';
import type { JsonMap } from '../types/index.js';

export interface MandatoryFooter {
  optionalPosition: number;
  optionalLength: number;
  /** Still-enciphered optional footer bytes (empty when length is 0). */
  optional: Uint8Array;
}

/**
 * Split the bytes that followed the compressed body into
 * [optional footer][mandatory footer]. The declared optional length is
 * attacker controlled and is range-checked before any slicing.
 */
export function decodeFooter(trailing: Uint8Array): MandatoryFooter {
  if (trailing.byteLength < MANDATORY_FOOTER_SIZE) {
    throw new FooterCorruptError(
      `Expected at least ${MANDATORY_FOOTER_SIZE} trailing bytes, found ${trailing.byteLength}`,
    );
  }
  const footerOffset = trailing.byteLength - MANDATORY_FOOTER_SIZE;
  if (!hasMagic(trailing, FOOTER_MAGIC, footerOffset)) {
    throw new FooterCorruptError('Bad footer magic');
  }
  const view = new DataView(trailing.buffer, trailing.byteOffset + footerOffset, MANDATORY_FOOTER_SIZE);
  if (view.getBigUint64(4, true) !== RESERVED) {
    throw new FooterCorruptError('Reserved footer field is not zero');
  }
  const rawPos = view.getBigUint64(12, true);
  const rawLen = view.getBigUint64(20, true);

  if (rawLen > BigInt(footerOffset)) {
    throw new FooterCorruptError(
      `Optional footer length ${rawLen} exceeds the ${footerOffset} bytes available`,
    );
  }
  if (rawLen !== BigInt(footerOffset)) {
    throw new FooterCorruptError(
      `${footerOffset - Number(rawLen)} unexpected bytes between body and footer`,
    );
  }
  if (rawPos > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new FooterCorruptError(`Optional footer position ${rawPos} out of range`);
  }

  const optionalLength = Number(rawLen);
  const start = footerOffset - optionalLength;
  return {
    optionalPosition: Number(rawPos),
    optionalLength,
    optional: trailing.subarray(start, footerOffset),
  };
}

/** Decipher and parse the optional footer, or null when there is none. */
export function decodeOptionalFooter(footer: MandatoryFooter, key: Uint8Array): JsonMap | null {
  if (footer.optionalLength === 0) return null;
  return decodeMetadata(footer.optional, key);
}
