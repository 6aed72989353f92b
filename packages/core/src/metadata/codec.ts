// packages/core/src/metadata/codec.ts
import { rc4Transform } from '../cipher/Rc4.js';
import { MetadataCodecError } from '../errors/index.js';
import type { JsonMap } from '../types/index.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

export function isJsonMap(value: unknown): value is JsonMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON-encode `map` and run it through a fresh keystream. */
export function encodeMetadata(map: JsonMap, key: Uint8Array): Uint8Array {
  let json: string;
  try {
    json = JSON.stringify(map);
  } catch (err) {
    throw new MetadataCodecError(
      `Metadata could not be JSON encoded: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  return rc4Transform(key, utf8Encoder.encode(json));
}

/**
 * Decipher and parse a metadata block. A wrong key surfaces here, as
 * bytes that are not UTF-8 JSON.
 */
export function decodeMetadata(bytes: Uint8Array, key: Uint8Array): JsonMap {
  const plain = rc4Transform(key, bytes);
  let value: unknown;
  try {
    value = JSON.parse(utf8Decoder.decode(plain));
  } catch (err) {
    throw new MetadataCodecError(
      'Metadata is not valid JSON (corrupt data or wrong key)',
      { cause: err },
    );
  }
  if (!isJsonMap(value)) {
    throw new MetadataCodecError('Metadata must be a JSON object');
  }
  return value;
}
