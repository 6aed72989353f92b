import { DigesterRegistry } from './DigesterRegistry.js';
import { Md5Digester, Sha1Digester, Sha256Digester, Sha512Digester } from '../digest/HashDigester.js';
import { LengthDigester } from '../digest/LengthDigester.js';

export const MAJOR_VERSION          = 1;
export const MANDATORY_HEADER_SIZE  = 38;
export const MANDATORY_FOOTER_SIZE  = 4 + 8 * 3;
export const RESERVED               = 0n;
export const KEY_LENGTH             = 16;

export const DEFAULT_BLOCK_SIZE     = 64 * 1024;
export const MAX_BLOCK_SIZE         = 16 * 1024 * 1024;
export const DEFAULT_MAX_METADATA   = 64 * 1024 * 1024;

/** First eight digits of pi, twice. An obfuscation convention, not a secret. */
export const DEFAULT_KEY: Readonly<Uint8Array> = Uint8Array.of(
  0x03, 0x01, 0x04, 0x01, 0x05, 0x09, 0x02, 0x06,
  0x03, 0x01, 0x04, 0x01, 0x05, 0x09, 0x02, 0x06,
);

DigesterRegistry.register('md5',    () => new Md5Digester());
DigesterRegistry.register('sha1',   () => new Sha1Digester());
DigesterRegistry.register('sha256', () => new Sha256Digester());
DigesterRegistry.register('sha512', () => new Sha512Digester());
DigesterRegistry.register('length', () => new LengthDigester());

/** Names of the digests every CaRT writer records by default, in footer order. */
export const DEFAULT_DIGESTS = ['md5', 'sha1', 'sha256', 'length'] as const;
