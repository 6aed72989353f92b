const DISABLE_STACKTRACE : boolean = true;

export class CartError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** The body stream could not be deciphered or decompressed. */
export class StreamCipherError    extends CartError {}
export class InvalidKeyLengthError extends CartError {}
/** Internal size check on a self-built mandatory header. */
export class HeaderEncodingError  extends CartError {}
/** Internal size check on a self-built mandatory footer. */
export class FooterEncodingError  extends CartError {}
export class HeaderCorruptError   extends CartError {}
export class FooterCorruptError   extends CartError {}
/** JSON encode/decode failure; on decode also the usual sign of a wrong key. */
export class MetadataCodecError   extends CartError {}
export class IOFailureError       extends CartError {}
export class FilesystemError      extends CartError {}
/** Malformed textual input such as a hex key. */
export class DecodingError        extends CartError {}

/**
 * Wrap anything thrown by a source or sink. CartErrors pass through untouched.
 */
export function toIOFailure(err: unknown, what: string): CartError {
  if (err instanceof CartError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new IOFailureError(`${what} failed: ${msg}`, { cause: err });
}
