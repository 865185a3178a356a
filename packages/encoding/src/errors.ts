/**
 * Encoding errors.
 *
 * Hashing itself is total; these are raised by the input checks that
 * run before it.
 */

export type EncodingErrorCode =
  | "ARRAY_LENGTH_MISMATCH"
  | "INVALID_INTENT"
  | "INVALID_TEMPLATE";

export class EncodingError extends Error {
  public readonly code: EncodingErrorCode;
  constructor(code: EncodingErrorCode, message: string) {
    super(message);
    this.name = "EncodingError";
    this.code = code;
  }
}
