#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, CommanderError, Option } from 'commander';
import { accessSync, constants as fsConstants, existsSync, realpathSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Readable, Writable } from 'node:stream';
import {
  Cart,
  DEFAULT_DIGESTS,
  DigesterRegistry,
  FilesystemError,
  MetadataCodecError,
  hexDecode,
  type ByteSink,
  type ByteSource,
  type JsonMap,
} from '../../core/src/index.js';
import { isJsonMap } from '../../core/src/metadata/codec.js';
import { toVerbosity } from '../../core/src/util/logger.js';
import { FileByteSink, FileByteSource, closeAfterFailure } from './fileIO.js';
import { ReadableByteSource, WritableByteSink } from './streamAdapter.js';
import { createCart } from './index.js';

const PKG_VERSION = '1.0.0'; // sync with root package.json

export interface CliIO {
  stdin  : Readable;
  stdout : Writable;
  stderr : Writable;
}

type GlobalOptions = {
  verbose   : number;
  blockSize?: number;
};

type PackCommandOptions = {
  out     : string;
  header? : string;
  footer? : string;
  digest? : string | false;
  key?    : string;
};

type UnpackCommandOptions = {
  out   : string;
  key?  : string;
  meta? : string;
};

const discard: ByteSink = {
  async write() {},
  async flush() {},
};

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function formatError(err: unknown): string {
  if (err instanceof Error) return `Error [${err.name}]: ${err.message}\n`;
  return `Error [Unknown]: ${String(err)}\n`;
}

function assertWritable(out: string, src: string): void {
  if (out === '-') return;
  const absOut = resolve(out);
  if (src !== '-' && existsSync(src) && existsSync(absOut) && realpathSync(src) === realpathSync(absOut)) {
    throw new FilesystemError('Refusing to overwrite the input file.');
  }
  const targetDir = dirname(absOut);
  if (!existsSync(targetDir)) {
    throw new FilesystemError(`Output directory does not exist: ${targetDir}`);
  }
  try {
    accessSync(targetDir, fsConstants.W_OK);
  } catch (err) {
    throw new FilesystemError('Output directory is not writeable', { cause: err });
  }
}

function parseMetadata(text: string, what: string): JsonMap {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new MetadataCodecError(`--${what} is not valid JSON`, { cause: err });
  }
  if (!isJsonMap(value)) throw new MetadataCodecError(`--${what} must be a JSON object`);
  return value;
}

function parseDigests(names: string | false | undefined) {
  if (names === false) return [];
  const list = names === undefined
    ? [...DEFAULT_DIGESTS]
    : names.split(',').map(n => n.trim()).filter(Boolean);
  return DigesterRegistry.create(list);
}

/** Open `src` (or stdin for "-") and run `fn`; the file is closed afterwards. */
async function withInput<T>(src: string, io: CliIO, fn: (source: ByteSource) => Promise<T>): Promise<T> {
  if (src === '-') return fn(new ReadableByteSource(io.stdin));
  const file = await FileByteSource.open(src);
  let result: T;
  try {
    result = await fn(file);
  } catch (err) {
    await closeAfterFailure(file);
    throw err;
  }
  await file.close();
  return result;
}

/** Create `out` (or use stdout for "-") and run `fn`; a failed run removes the file. */
async function withOutput<T>(out: string, io: CliIO, fn: (sink: ByteSink) => Promise<T>): Promise<T> {
  if (out === '-') return fn(new WritableByteSink(io.stdout));
  const file = await FileByteSink.create(out);
  let result: T;
  try {
    result = await fn(file);
    await file.close();
  } catch (err) {
    await closeAfterFailure(file);
    await rm(out, { force: true });
    throw err;
  }
  return result;
}

/* ------------------------------------------------------------------ */
/*  Program                                                            */
/* ------------------------------------------------------------------ */

export function buildProgram(io: CliIO): Command {
  const program = new Command();

  const cartFromOptions = (): Cart => {
    const opts = program.opts<GlobalOptions>();
    return createCart({
      verbose   : toVerbosity(opts.verbose),
      blockSize : opts.blockSize,
      logger    : msg => { io.stderr.write(msg + '\n'); },
    });
  };

  program
    .name('cart')
    .version(PKG_VERSION)
    .description('Pack files into neutered CaRT containers and back')
    .exitOverride()
    .configureOutput({
      writeOut: str => { io.stdout.write(str); },
      writeErr: str => { io.stderr.write(str); },
    })

    // block-size
    .addOption(
      new Option('-b, --block-size <bytes>', 'read/compress block size in bytes')
        .argParser((v) => {
          const n = Number(v);
          if (!Number.isInteger(n) || n <= 0) {
            throw new Error('Block size must be a positive integer');
          }
          return n;
        })
    )

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1)
    );

  program
    .command('pack <src>')
    .description('Pack a file; use - for STDIN, --out - for STDOUT')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .option('--header <json>', 'optional header metadata (JSON object)')
    .option('--footer <json>', 'optional footer metadata (JSON object)')
    .option('--digest <names>', `comma-separated digests (default ${DEFAULT_DIGESTS.join(',')})`)
    .option('--no-digest', 'record no digests')
    .option('--key <hex>', '16-byte key as hex; not stored in the output')
    .action(async (src: string, opts: PackCommandOptions) => {
      assertWritable(opts.out, src);
      const header    = opts.header === undefined ? null : parseMetadata(opts.header, 'header');
      const footer    = opts.footer === undefined ? null : parseMetadata(opts.footer, 'footer');
      const digesters = parseDigests(opts.digest);
      const key       = opts.key === undefined ? null : hexDecode(opts.key);
      const cart      = cartFromOptions();

      await withInput(src, io, source =>
        withOutput(opts.out, io, sink => cart.pack(source, sink, { header, footer, digesters, key })),
      );
    });

  program
    .command('unpack <src>')
    .description('Unpack a CaRT file; metadata JSON goes to STDERR unless --meta is given')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .option('--key <hex>', '16-byte key as hex, overriding the stored one')
    .option('--meta <file>', 'write the header/footer metadata JSON to this file')
    .action(async (src: string, opts: UnpackCommandOptions) => {
      assertWritable(opts.out, src);
      if (opts.meta !== undefined) assertWritable(opts.meta, src);
      const key  = opts.key === undefined ? null : hexDecode(opts.key);
      const cart = cartFromOptions();

      const meta = await withInput(src, io, source =>
        withOutput(opts.out, io, sink => cart.unpack(source, sink, { key })),
      );
      const json = JSON.stringify(meta, null, 2) + '\n';
      if (opts.meta !== undefined) await writeFile(opts.meta, json, 'utf8');
      else io.stderr.write(json);
    });

  program
    .command('info <src>')
    .description('Show the header and footer metadata of a CaRT file; use - for STDIN')
    .option('--key <hex>', '16-byte key as hex, overriding the stored one')
    .action(async (src: string, opts: { key?: string }) => {
      const key  = opts.key === undefined ? null : hexDecode(opts.key);
      const cart = cartFromOptions();
      const meta = await withInput(src, io, source => cart.unpack(source, discard, { key }));
      io.stdout.write(JSON.stringify(meta, null, 2) + '\n');
    });

  return program;
}

/**
 * Run the CLI with `argv` (without the node and script entries) and
 * resolve with the process exit status.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    io.stderr.write(formatError(err));
    return 1;
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMain()) {
  process.exitCode = await run(process.argv.slice(2), {
    stdin  : process.stdin,
    stdout : process.stdout,
    stderr : process.stderr,
  });
}
