/**
 * Codec errors.
 */

/**
 * Error codes for binary transaction encoding and decoding.
 */
export type TransactionCodecErrorCode =
  | "TRUNCATED"
  | "TRAILING_BYTES"
  | "UNKNOWN_TYPE_ID"
  | "UNSUPPORTED_CODEC_VERSION"
  | "INVALID_LENGTH"
  | "OUT_OF_RANGE"
  | "INVALID_ENCODING";

/**
 * Thrown when bytes do not form a valid value of the expected format, or a
 * value cannot be represented in it.
 */
export class TransactionCodecError extends Error {
  public readonly code: TransactionCodecErrorCode;

  constructor(code: TransactionCodecErrorCode, message: string) {
    super(message);
    this.name = "TransactionCodecError";
    this.code = code;
  }
}
