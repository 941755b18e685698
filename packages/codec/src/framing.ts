import { TransactionCodecError } from "./errors.js";
import type { Reader, Writer } from "./packer.js";

/** The only codec version any chain currently writes. */
export const CODEC_VERSION = 0;

export function writeCodecVersion(w: Writer): void {
  w.u16(CODEC_VERSION);
}

export function readCodecVersion(r: Reader): void {
  const version = r.u16();
  if (version !== CODEC_VERSION) {
    throw new TransactionCodecError(
      "UNSUPPORTED_CODEC_VERSION",
      `unsupported codec version ${version}`,
    );
  }
}
