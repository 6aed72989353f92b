// packages/core/src/header/decoder.ts
import { HEADER_MAGIC, hasMagic } from './constants.js';
import {
  DEFAULT_MAX_METADATA,
  KEY_LENGTH,
  MAJOR_VERSION,
  MANDATORY_HEADER_SIZE,
  RESERVED,
} from '../config/defaults.js';
import { HeaderCorruptError } from '../errors/index.js';
import { assertKey } from '../cipher/Rc4.js';
import { decodeMetadata } from '../metadata/codec.js';
import { readExactly } from '../util/ByteSource.js';
import type { ByteSource, JsonMap } from '../types/index.js';

export interface MandatoryHeader {
  /** Key to use for the rest of the container (the override, if one was given). */
  key: Uint8Array;
  /** Key bytes as stored in the file; all zero when the writer used an override. */
  storedKey: Uint8Array;
  optionalHeaderLength: number;
  bytesRead: number;
}

/** Parse the 38 mandatory header bytes. */
export function parseHeader(
  buf: Uint8Array,
  keyOverride?: Uint8Array | null,
  maxMetadata: number = DEFAULT_MAX_METADATA,
): MandatoryHeader {
  if (buf.byteLength < MANDATORY_HEADER_SIZE) {
    throw new HeaderCorruptError('Mandatory header truncated');
  }
  if (!hasMagic(buf, HEADER_MAGIC)) {
    throw new HeaderCorruptError('Bad header magic, not a CaRT container');
  }
  const view = new DataView(buf.buffer, buf.byteOffset, MANDATORY_HEADER_SIZE);
  const version = view.getInt16(4, true);
  if (version !== MAJOR_VERSION) {
    throw new HeaderCorruptError(`Unsupported CaRT version ${version}`);
  }
  if (view.getBigUint64(6, true) !== RESERVED) {
    throw new HeaderCorruptError('Reserved header field is not zero');
  }
  const storedKey = buf.slice(14, 14 + KEY_LENGTH);
  const rawLen    = view.getBigUint64(14 + KEY_LENGTH, true);
  if (rawLen > BigInt(maxMetadata)) {
    throw new HeaderCorruptError(`Optional header length ${rawLen} exceeds limit of ${maxMetadata} bytes`);
  }

  let key = storedKey;
  if (keyOverride != null) {
    assertKey(keyOverride);
    key = Uint8Array.from(keyOverride);
  }

  return {
    key,
    storedKey,
    optionalHeaderLength: Number(rawLen),
    bytesRead: MANDATORY_HEADER_SIZE,
  };
}

/** Read and validate the mandatory header from the front of `source`. */
export async function decodeHeader(
  source: ByteSource,
  keyOverride?: Uint8Array | null,
  maxMetadata?: number,
): Promise<MandatoryHeader> {
  const buf = await readExactly(source, MANDATORY_HEADER_SIZE, 'mandatory header');
  return parseHeader(buf, keyOverride, maxMetadata);
}

/** Read `length` bytes of optional header, decipher and parse them. */
export async function decodeOptionalHeader(
  source: ByteSource,
  key: Uint8Array,
  length: number,
): Promise<JsonMap> {
  const buf = await readExactly(source, length, 'optional header');
  return decodeMetadata(buf, key);
}
