// packages/node-runtime/src/fileIO.ts
import { open, type FileHandle } from 'node:fs/promises';
import type { ByteSink, ByteSource } from '../../core/src/types/index.js';
import { FilesystemError, toIOFailure } from '../../core/src/errors/index.js';

function fsError(what: string, path: string, err: unknown): FilesystemError {
  const msg = err instanceof Error ? err.message : String(err);
  return new FilesystemError(`Cannot ${what} ${path}: ${msg}`, { cause: err });
}

/** Sequential ByteSource over a file opened read-only. */
export class FileByteSource implements ByteSource {
  private constructor(private readonly fh: FileHandle) {}

  static async open(path: string): Promise<FileByteSource> {
    try {
      return new FileByteSource(await open(path, 'r'));
    } catch (err) {
      throw fsError('open', path, err);
    }
  }

  async read(into: Uint8Array): Promise<number> {
    if (into.byteLength === 0) return 0;
    try {
      const { bytesRead } = await this.fh.read(into, 0, into.byteLength, null);
      return bytesRead;
    } catch (err) {
      throw toIOFailure(err, 'Reading file');
    }
  }

  async close(): Promise<void> { await this.fh.close(); }
}

/** ByteSink writing to a file that is created or truncated on open. */
export class FileByteSink implements ByteSink {
  private constructor(private readonly fh: FileHandle) {}

  static async create(path: string): Promise<FileByteSink> {
    try {
      return new FileByteSink(await open(path, 'w'));
    } catch (err) {
      throw fsError('create', path, err);
    }
  }

  async write(chunk: Uint8Array): Promise<void> {
    let off = 0;
    try {
      while (off < chunk.byteLength) {
        const { bytesWritten } = await this.fh.write(chunk, off, chunk.byteLength - off);
        off += bytesWritten;
      }
    } catch (err) {
      throw toIOFailure(err, 'Writing file');
    }
  }

  async flush(): Promise<void> {
    try {
      await this.fh.datasync();
    } catch (err) {
      throw toIOFailure(err, 'Flushing file');
    }
  }

  async close(): Promise<void> { await this.fh.close(); }
}

/**
 * Close `file` once the operation has already failed. A close failure
 * then is dropped so that the caller sees the operation's own error.
 */
export async function closeAfterFailure(file: FileByteSource | FileByteSink): Promise<void> {
  await file.close().catch(() => undefined);
}
