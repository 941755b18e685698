/**
 * Chain detection.
 *
 * Raw transaction bytes do not say which chain produced them. Each chain
 * codec is tried in turn and the bytes are attributed to a chain only when
 * exactly one codec accepts them. Zero or several successes both yield
 * "undefined"; a collision is never resolved by picking a winner.
 */

import type { ChainTag, DefinedChainTag, NetworkId } from "@subnetkit/types";
import { UNDEFINED_CHAIN, UNKNOWN_NETWORK_ID } from "@subnetkit/types";
import { assertNever } from "./assert.js";
import { decodeCChainUnsignedTx, getCChainNetworkId } from "./cchain/codec.js";
import type { CChainUnsignedTx } from "./cchain/types.js";
import { getPChainNetworkId } from "./pchain/auth.js";
import { decodePChainUnsignedTx } from "./pchain/codec.js";
import type { PChainUnsignedTx } from "./pchain/types.js";
import { decodeXChainUnsignedTx, getXChainNetworkId } from "./xchain/codec.js";
import type { XChainUnsignedTx } from "./xchain/types.js";

export type DecodedTx =
  | { readonly chain: "P"; readonly tx: PChainUnsignedTx }
  | { readonly chain: "X"; readonly tx: XChainUnsignedTx }
  | { readonly chain: "C"; readonly tx: CChainUnsignedTx };

/**
 * One chain's unsigned transaction decoder. `decodeUnsigned` throws on any
 * bytes that are not a complete transaction of that chain.
 */
export interface ChainCodec {
  readonly tag: DefinedChainTag;
  decodeUnsigned(bytes: Uint8Array): DecodedTx;
}

export const PCHAIN_CODEC: ChainCodec = {
  tag: "P",
  decodeUnsigned: (bytes) => ({ chain: "P", tx: decodePChainUnsignedTx(bytes) }),
};

export const XCHAIN_CODEC: ChainCodec = {
  tag: "X",
  decodeUnsigned: (bytes) => ({ chain: "X", tx: decodeXChainUnsignedTx(bytes) }),
};

export const CCHAIN_CODEC: ChainCodec = {
  tag: "C",
  decodeUnsigned: (bytes) => ({ chain: "C", tx: decodeCChainUnsignedTx(bytes) }),
};

export const DEFAULT_CHAIN_CODECS: readonly ChainCodec[] = [
  CCHAIN_CODEC,
  XCHAIN_CODEC,
  PCHAIN_CODEC,
];

interface Classification {
  readonly tag: ChainTag;
  readonly decoded?: DecodedTx;
}

function classify(bytes: Uint8Array, codecs: readonly ChainCodec[]): Classification {
  if (bytes.length === 0) {
    return { tag: UNDEFINED_CHAIN };
  }

  // Every codec runs, even after a success, so collisions are seen.
  const hits: { tag: DefinedChainTag; decoded: DecodedTx }[] = [];
  for (const codec of codecs) {
    try {
      hits.push({ tag: codec.tag, decoded: codec.decodeUnsigned(bytes) });
    } catch {
      // not this chain
    }
  }

  const [only] = hits;
  if (hits.length !== 1 || only === undefined) {
    return { tag: UNDEFINED_CHAIN };
  }
  return only;
}

export function detectChain(
  bytes: Uint8Array,
  codecs: readonly ChainCodec[] = DEFAULT_CHAIN_CODECS,
): ChainTag {
  return classify(bytes, codecs).tag;
}

/**
 * Decode bytes under the single chain that accepts them, or undefined when
 * detection is ambiguous or fails.
 */
export function decodeTx(
  bytes: Uint8Array,
  codecs: readonly ChainCodec[] = DEFAULT_CHAIN_CODECS,
): DecodedTx | undefined {
  return classify(bytes, codecs).decoded;
}

export function networkIdOf(decoded: DecodedTx): NetworkId {
  switch (decoded.chain) {
    case "P":
      return getPChainNetworkId(decoded.tx);
    case "X":
      return getXChainNetworkId(decoded.tx);
    case "C":
      return getCChainNetworkId(decoded.tx);
    default:
      return assertNever(decoded, "decoded transaction");
  }
}

/**
 * The network ID embedded in the transaction, or 0 when the chain cannot be
 * determined. 0 is never a real network.
 */
export function extractNetworkId(
  bytes: Uint8Array,
  codecs: readonly ChainCodec[] = DEFAULT_CHAIN_CODECS,
): NetworkId {
  const decoded = decodeTx(bytes, codecs);
  return decoded === undefined ? UNKNOWN_NETWORK_ID : networkIdOf(decoded);
}
