// packages/core/src/index.ts

import './config/defaults.js';

import {
  DEFAULT_BLOCK_SIZE,
  DEFAULT_MAX_METADATA,
  MANDATORY_FOOTER_SIZE,
  MAX_BLOCK_SIZE,
} from './config/defaults.js';
import { encodeHeader }                          from './header/encoder.js';
import { decodeHeader, decodeOptionalHeader }    from './header/decoder.js';
import { encodeFooter }                          from './footer/encoder.js';
import { decodeFooter, decodeOptionalFooter }    from './footer/decoder.js';
import { encodeMetadata }                        from './metadata/codec.js';
import { assertKey, resolveKey }                 from './cipher/Rc4.js';
import { defaultDigesters, mergeDigests, type Digester } from './digest/index.js';
import { StreamProcessor }                       from './stream/StreamProcessor.js';
import { CipherSink }                            from './stream/CipherSink.js';
import { CipherSource }                          from './stream/CipherSource.js';
import { BufferSink, BufferSource }              from './util/ByteSource.js';
import { hexEncode }                             from './util/bytes.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';
import { toIOFailure } from './errors/index.js';
import type { ByteSink, ByteSource, JsonMap, UnpackResult } from './types/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring Cart instance behavior.
 */
export interface CartOptions {
  /** Read/compress block size in bytes; defaults to 64 KiB */
  blockSize?        : number;
  /** Largest optional header or footer accepted when unpacking */
  maxMetadataBytes? : number;
  /** Verbosity level 0-4 for logging (0 = warnings only) */
  verbose?          : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?           : (msg: string) => void;
}

export interface PackOptions {
  /** Metadata stored enciphered right after the mandatory header */
  header?    : JsonMap | null;
  /** Metadata stored after the body; digest results are merged into it */
  footer?    : JsonMap | null;
  /** Digesters fed the plaintext, in order. Defaults to md5, sha1, sha256, length; pass [] for none */
  digesters? : readonly Digester[];
  /** 16-byte key to use instead of the default; it is not written to the file */
  key?       : Uint8Array | null;
}

export interface UnpackOptions {
  /** 16-byte key to use instead of the one stored in the header */
  key? : Uint8Array | null;
}

export interface UnpackedData extends UnpackResult {
  body : Uint8Array;
}

/**
 * Cart packs arbitrary content into the CaRT container format and back.
 * Content is compressed and run through a keystream so it is neither
 * executable nor recognisable; it is not protected in any real sense.
 */
export class Cart {
  private blockSize   : number;
  private maxMetadata : number;

  // - diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  constructor(opt: CartOptions = {}) {
    this.blockSize   = this.setBlockSize(opt.blockSize ?? DEFAULT_BLOCK_SIZE);
    this.maxMetadata = opt.maxMetadataBytes ?? DEFAULT_MAX_METADATA;
    if (!Number.isInteger(this.maxMetadata) || this.maxMetadata < 0) {
      throw new RangeError(`Invalid maxMetadataBytes: ${opt.maxMetadataBytes}`);
    }
    this.log = createLogger(opt.verbose ?? 0, opt.logger);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Check whether `source` starts with a valid mandatory header.
   * Consumes the first 38 bytes; never throws for malformed input.
   */
  static async isCart(source: ByteSource): Promise<boolean> {
    try {
      await decodeHeader(source);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Decode only the headers: the optional header metadata, or null when the
   * container has none. The body is not touched.
   */
  async readHeader(source: ByteSource, opt: UnpackOptions = {}): Promise<JsonMap | null> {
    const hdr = await decodeHeader(source, opt.key, this.maxMetadata);
    if (hdr.optionalHeaderLength === 0) return null;
    return decodeOptionalHeader(source, hdr.key, hdr.optionalHeaderLength);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Setters / getters
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Configure the block size used for reading, compressing and inflating.
   * @param bytes - positive integer, at most 16 MiB
   */
  setBlockSize(bytes: number): number {
    if (!Number.isInteger(bytes) || bytes < 1) {
      throw new RangeError(`Invalid blockSize: ${bytes}. Must be a positive integer.`);
    }
    if (bytes > MAX_BLOCK_SIZE) {
      throw new RangeError(`blockSize cannot exceed ${MAX_BLOCK_SIZE} bytes.`);
    }
    this.blockSize = bytes;
    return bytes;
  }
  getBlockSize(): number                     { return this.blockSize; }

  setVerbose(level: Verbosity): void         { this.log.level = level; }
  getVerbose(): Verbosity                    { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  Streams
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Pack everything `source` yields into `sink` as a CaRT container.
   * On failure the sink may hold a partial container; discarding it is up
   * to the caller.
   */
  async pack(source: ByteSource, sink: ByteSink, opt: PackOptions = {}): Promise<void> {
    const { key, overridden } = resolveKey(opt.key);
    const digesters = opt.digesters ?? defaultDigesters();
    if (overridden) this.log.log(0, 'Packing with a custom key; it will be needed to unpack');
    this.log.log(1, `Start packing, block size: ${this.blockSize}`);

    const optHeader = opt.header ? encodeMetadata(opt.header, key) : null;
    let pos = 0;

    const header = encodeHeader(key, overridden, optHeader?.byteLength ?? 0);
    await this.emit(sink, header, 'mandatory header');
    pos += header.byteLength;

    if (optHeader) {
      await this.emit(sink, optHeader, 'optional header');
      pos += optHeader.byteLength;
      this.log.log(2, `Optional header: ${optHeader.byteLength} bytes`);
    }

    const body = new CipherSink(sink, key);
    const stream = new StreamProcessor(this.blockSize, this.log);
    const { bytesIn, bytesOut } = await stream.compress(source, body, digesters);
    pos += bytesOut;
    this.log.log(2, `Body: ${bytesIn} bytes compressed to ${bytesOut}`);

    const footerMap = mergeDigests(opt.footer ?? null, digesters);
    let footerPos = 0;
    let footerLen = 0;
    if (footerMap) {
      const optFooter = encodeMetadata(footerMap, key);
      footerPos = pos;
      footerLen = optFooter.byteLength;
      await this.emit(sink, optFooter, 'optional footer');
      pos += footerLen;
      this.log.log(3, `Optional footer: ${footerLen} bytes at ${footerPos}`);
    }

    await this.emit(sink, encodeFooter(footerPos, footerLen), 'mandatory footer');
    await body.flush();
    this.log.log(1, 'Packing finished');
  }

  /**
   * Unpack the container in `source`, writing the original content to
   * `sink`. Resolves with the header and footer metadata; any failure
   * rejects without partial metadata.
   */
  async unpack(source: ByteSource, sink: ByteSink, opt: UnpackOptions = {}): Promise<UnpackResult> {
    if (opt.key != null) assertKey(opt.key);
    this.log.log(1, 'Start unpacking');

    const hdr = await decodeHeader(source, opt.key, this.maxMetadata);
    this.log.log(3, `Stored key: ${hexEncode(hdr.storedKey)}`);

    let header: JsonMap | null = null;
    if (hdr.optionalHeaderLength > 0) {
      header = await decodeOptionalHeader(source, hdr.key, hdr.optionalHeaderLength);
      this.log.log(2, `Optional header: ${hdr.optionalHeaderLength} bytes`);
    }

    const body = new CipherSource(source, hdr.key, this.blockSize);
    const stream = new StreamProcessor(this.blockSize, this.log);
    const { consumed, unconsumed, written } = await stream.decompress(body, sink);
    this.log.log(2, `Body: ${consumed} bytes inflated to ${written}`);

    const trailing = await body.takeRemaining(unconsumed, this.maxMetadata + MANDATORY_FOOTER_SIZE);
    const footerInfo = decodeFooter(trailing);
    const expectedPos = hdr.bytesRead + hdr.optionalHeaderLength + consumed;
    if (footerInfo.optionalLength > 0 && footerInfo.optionalPosition !== expectedPos) {
      this.log.log(2, `Optional footer recorded at ${footerInfo.optionalPosition}, found at ${expectedPos}`);
    }
    const footer = decodeOptionalFooter(footerInfo, hdr.key);

    try {
      await sink.flush();
    } catch (err) {
      throw toIOFailure(err, 'Flushing output');
    }
    this.log.log(1, 'Unpacking finished');
    return { header, footer };
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Buffers
  // ════════════════════════════════════════════════════════════════════════

  /** Pack an in-memory buffer and return the whole container. */
  async packData(data: Uint8Array, opt: PackOptions = {}): Promise<Uint8Array> {
    const sink = new BufferSink();
    await this.pack(new BufferSource(data), sink, opt);
    return sink.bytes;
  }

  /** Unpack an in-memory container. */
  async unpackData(data: Uint8Array, opt: UnpackOptions = {}): Promise<UnpackedData> {
    const sink = new BufferSink();
    const { header, footer } = await this.unpack(new BufferSource(data), sink, opt);
    return { body: sink.bytes, header, footer };
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Helpers
  // ════════════════════════════════════════════════════════════════════════

  private async emit(sink: ByteSink, bytes: Uint8Array, what: string): Promise<void> {
    try {
      await sink.write(bytes);
    } catch (err) {
      throw toIOFailure(err, `Writing ${what}`);
    }
  }
}

export * from './errors/index.js';
export type { ByteSink, ByteSource, JsonMap, JsonValue, UnpackResult } from './types/index.js';
export { BufferSink, BufferSource } from './util/ByteSource.js';
export {
  defaultDigesters,
  HashDigester,
  LengthDigester,
  Md5Digester,
  Sha1Digester,
  Sha256Digester,
  Sha512Digester,
  type Digester,
} from './digest/index.js';
export { DigesterRegistry } from './config/DigesterRegistry.js';
export { DEFAULT_DIGESTS, DEFAULT_KEY } from './config/defaults.js';
export { Rc4 } from './cipher/Rc4.js';
export { hexDecode, hexEncode } from './util/bytes.js';
export type { Verbosity } from './util/logger.js';
