// packages/core/src/config/DigesterRegistry.ts
import type { Digester } from '../digest/Digester.js';
import { CartError } from '../errors/index.js';

export type DigesterFactory = () => Digester;

export class DigesterRegistry {
  private static readonly byName = new Map<string, DigesterFactory>();

  static register(name: string, factory: DigesterFactory): void {
    if (this.byName.has(name)) throw new CartError(`Digester ${name} already registered`);
    this.byName.set(name, factory);
  }
  static has(name: string): boolean { return this.byName.has(name); }
  static get(name: string): DigesterFactory {
    const f = this.byName.get(name);
    if (!f) throw new CartError(`Unknown digester: ${name}`);
    return f;
  }
  /** Fresh digester instances, one per name, in the order given. */
  static create(names: readonly string[]): Digester[] {
    return names.map(n => this.get(n)());
  }
  static names(): string[] { return [...this.byName.keys()]; }
}
