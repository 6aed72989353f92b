import type { Digester } from './Digester.js';
import { CartError } from '../errors/index.js';

/** Counts body bytes; finishes to the decimal count. */
export class LengthDigester implements Digester {
  readonly name = 'length';
  private count = 0;
  private finished = false;

  update(data: Uint8Array): void {
    if (this.finished) throw new CartError('Digester length already finished');
    this.count += data.byteLength;
  }

  finish(): string {
    if (this.finished) throw new CartError('Digester length already finished');
    this.finished = true;
    return String(this.count);
  }
}
