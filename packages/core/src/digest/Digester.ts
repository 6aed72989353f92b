/**
 * A named accumulator over the plaintext body. Fed every input block while
 * packing, finalized once into a footer entry.
 */
export interface Digester {
  /** Footer key the finished value is stored under. */
  readonly name: string;
  update(data: Uint8Array): void;
  /** Hex digest or decimal count. May only be called once. */
  finish(): string;
}
