/* ------------------------- Metadata ---------------------------------- */

/**
 * Numbers are IEEE doubles: integers above 2^53 in decoded metadata are
 * rounded by `JSON.parse`. Store such values as strings (the length
 * digester does) to keep them exact.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Insertion-ordered string-keyed metadata carried in optional header/footer. */
export type JsonMap = { [key: string]: JsonValue };

/* ------------------------- Byte I/O ---------------------------------- */

/**
 * Pull side of the collaborator boundary. `read` fills at most
 * `into.byteLength` bytes and resolves with the count; 0 means EOF.
 */
export interface ByteSource {
  read(into: Uint8Array): Promise<number>;
}

/** Push side of the collaborator boundary. */
export interface ByteSink {
  write(chunk: Uint8Array): Promise<void>;
  flush(): Promise<void>;
}

/* ------------------------- Results ----------------------------------- */
export interface UnpackResult {
  header: JsonMap | null;
  footer: JsonMap | null;
}
