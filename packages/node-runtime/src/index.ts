// packages/node-runtime/src/index.ts
import { rm } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  Cart,
  FilesystemError,
  type CartOptions,
  type JsonMap,
  type PackOptions,
  type UnpackOptions,
  type UnpackResult,
} from '../../core/src/index.js';
import { FileByteSink, FileByteSource, closeAfterFailure } from './fileIO.js';

export function createCart(cfg?: CartOptions): Cart {
  return new Cart(cfg);
}

function assertDistinct(src: string, dst: string): void {
  if (resolve(src) === resolve(dst)) {
    throw new FilesystemError(`Input and output are the same file: ${src}`);
  }
}

/** Run `fn` between an opened input file and a freshly created output file. */
async function withFiles<T>(
  src: string,
  dst: string,
  fn: (source: FileByteSource, sink: FileByteSink) => Promise<T>,
): Promise<T> {
  assertDistinct(src, dst);
  const source = await FileByteSource.open(src);
  let result: T;
  try {
    const sink = await FileByteSink.create(dst);
    try {
      result = await fn(source, sink);
      await sink.close();
    } catch (err) {
      await closeAfterFailure(sink);
      await rm(dst, { force: true });
      throw err;
    }
  } catch (err) {
    await closeAfterFailure(source);
    throw err;
  }
  await source.close();
  return result;
}

/** Pack the file at `src` into a new container at `dst`. A failed run leaves no output file. */
export function packFile(
  src: string,
  dst: string,
  opt: PackOptions = {},
  cfg?: CartOptions,
): Promise<void> {
  const cart = createCart(cfg);
  return withFiles(src, dst, (source, sink) => cart.pack(source, sink, opt));
}

/** Unpack the container at `src` into `dst`. A failed run leaves no output file. */
export function unpackFile(
  src: string,
  dst: string,
  opt: UnpackOptions = {},
  cfg?: CartOptions,
): Promise<UnpackResult> {
  const cart = createCart(cfg);
  return withFiles(src, dst, (source, sink) => cart.unpack(source, sink, opt));
}

/** True when the file starts with a valid mandatory header. */
export async function isCartFile(path: string): Promise<boolean> {
  const source = await FileByteSource.open(path);
  try {
    return await Cart.isCart(source);
  } finally {
    await source.close();
  }
}

/** Optional header metadata of the container at `path`, or null when it has none. */
export async function readFileHeader(
  path: string,
  opt: UnpackOptions = {},
  cfg?: CartOptions,
): Promise<JsonMap | null> {
  const source = await FileByteSource.open(path);
  try {
    return await createCart(cfg).readHeader(source, opt);
  } finally {
    await source.close();
  }
}

export * from '../../core/src/index.js';
export { FileByteSink, FileByteSource } from './fileIO.js';
export { ReadableByteSource, WritableByteSink } from './streamAdapter.js';
