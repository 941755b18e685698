/**
 * Deterministic merge of independently advanced copies.
 *
 * Two signers may each fill different slots of the same transaction from
 * one starting snapshot. Merging keeps, per slot, a filled signature over
 * an empty one. When both copies hold different signatures for one slot
 * the lexicographically smaller wins, so the result does not depend on
 * merge order or grouping.
 */

import type { Credential, SignedPChainTx } from "@subnetkit/codec";
import {
  SIGNATURE_LEN,
  bytesEqual,
  compareBytes,
  isAllZero,
  unsignedBytesOf,
} from "@subnetkit/codec";
import { MultisigError } from "./errors.js";

/** Returns a fresh buffer; neither input is aliased. */
export function mergeSlot(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (isAllZero(a)) return isAllZero(b) ? new Uint8Array(SIGNATURE_LEN) : b.slice();
  if (isAllZero(b)) return a.slice();
  return (compareBytes(a, b) <= 0 ? a : b).slice();
}

export function mergeCredentials(
  a: readonly Credential[],
  b: readonly Credential[],
): Credential[] {
  if (a.length !== b.length) {
    throw new MultisigError(
      "MERGE_CONFLICT",
      `Credential counts differ: ${a.length} vs ${b.length}`,
    );
  }
  return a.map((credA, i) => {
    const credB = b[i];
    if (credB === undefined || credA.signatures.length !== credB.signatures.length) {
      throw new MultisigError("MERGE_CONFLICT", `Credential ${i} has a different slot count`);
    }
    return {
      signatures: credA.signatures.map((sigA, j) => {
        const sigB = credB.signatures[j];
        return sigB === undefined ? sigA.slice() : mergeSlot(sigA, sigB);
      }),
    };
  });
}

/**
 * @throws MultisigError MERGE_CONFLICT when the copies are not the same
 *   unsigned transaction or their credential shapes differ
 */
export function mergeSignedTxs(a: SignedPChainTx, b: SignedPChainTx): SignedPChainTx {
  if (!bytesEqual(unsignedBytesOf(a), unsignedBytesOf(b))) {
    throw new MultisigError("MERGE_CONFLICT", "Cannot merge different transactions");
  }
  return { unsigned: a.unsigned, credentials: mergeCredentials(a.credentials, b.credentials) };
}
