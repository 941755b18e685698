/**
 * Signed platform-chain transactions.
 *
 * The signed encoding is the unsigned encoding followed by the credential
 * list, so the unsigned bytes are always a prefix of the signed bytes and
 * the transaction ID covers both.
 */

import { credential, MIN_CREDENTIAL_LEN, type Credential } from "../components.js";
import { computeTxId } from "../encoding.js";
import { Reader, Writer } from "../packer.js";
import { pchainUnsignedTx } from "./codec.js";
import type { PChainUnsignedTx } from "./types.js";

export interface SignedPChainTx {
  readonly unsigned: PChainUnsignedTx;
  readonly credentials: readonly Credential[];
}

export interface DecodedSignedPChainTx extends SignedPChainTx {
  /** Exact unsigned bytes as they appeared on the wire. */
  readonly unsignedBytes: Uint8Array;
}

export function unsignedBytesOf(tx: SignedPChainTx): Uint8Array {
  const w = new Writer();
  pchainUnsignedTx.encode(w, tx.unsigned);
  return w.toBytes();
}

export function encodeSignedPChainTx(tx: SignedPChainTx): Uint8Array {
  const w = new Writer();
  pchainUnsignedTx.encode(w, tx.unsigned);
  w.array(tx.credentials, credential.encode);
  return w.toBytes();
}

export function decodeSignedPChainTx(bytes: Uint8Array): DecodedSignedPChainTx {
  const r = new Reader(bytes);
  const unsigned = pchainUnsignedTx.decode(r);
  const unsignedBytes = bytes.slice(0, bytes.length - r.remaining());
  const credentials = r.array(credential.decode, MIN_CREDENTIAL_LEN);
  r.expectEnd();
  return { unsigned, credentials, unsignedBytes };
}

export function signedPChainTxId(tx: SignedPChainTx): string {
  return computeTxId(encodeSignedPChainTx(tx));
}
