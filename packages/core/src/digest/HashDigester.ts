// packages/core/src/digest/HashDigester.ts
import { md5, sha1 } from '@noble/hashes/legacy.js';
import { sha256, sha512 } from '@noble/hashes/sha2.js';
import { bytesToHex } from '@noble/hashes/utils.js';
import type { Digester } from './Digester.js';
import { CartError } from '../errors/index.js';

interface IncrementalHash {
  update(data: Uint8Array): unknown;
  digest(): Uint8Array;
}

/** Lowercase-hex digest over everything passed to update(). */
export class HashDigester implements Digester {
  private finished = false;

  constructor(
    readonly name: string,
    private readonly hash: IncrementalHash,
  ) {}

  update(data: Uint8Array): void {
    if (this.finished) throw new CartError(`Digester ${this.name} already finished`);
    this.hash.update(data);
  }

  finish(): string {
    if (this.finished) throw new CartError(`Digester ${this.name} already finished`);
    this.finished = true;
    return bytesToHex(this.hash.digest());
  }
}

export class Md5Digester extends HashDigester {
  constructor() { super('md5', md5.create()); }
}

export class Sha1Digester extends HashDigester {
  constructor() { super('sha1', sha1.create()); }
}

export class Sha256Digester extends HashDigester {
  constructor() { super('sha256', sha256.create()); }
}

export class Sha512Digester extends HashDigester {
  constructor() { super('sha512', sha512.create()); }
}
