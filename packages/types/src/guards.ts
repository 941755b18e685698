/**
 * Runtime Type Guards
 *
 * Narrowing functions for values that cross a process boundary
 * (resolver responses, configuration, exchanged files).
 */

import type { Address, ChainTag, DefinedChainTag, NetworkId } from "./chain.js";
import type { Ownership } from "./ownership.js";

const CHAIN_TAGS = new Set<string>(["P", "X", "C", "undefined"]);
const DEFINED_TAGS = new Set<string>(["P", "X", "C"]);

// <alias>-<hrp>1<bech32 data>
const ADDRESS_PATTERN = /^[PXC]-[a-z0-9]{1,83}1[02-9ac-hj-np-z]{6,}$/;

const MAX_U32 = 0xffff_ffff;

export function isChainTag(value: unknown): value is ChainTag {
  return typeof value === "string" && CHAIN_TAGS.has(value);
}

export function isDefinedChainTag(value: unknown): value is DefinedChainTag {
  return typeof value === "string" && DEFINED_TAGS.has(value);
}

export function isNetworkId(value: unknown): value is NetworkId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value > 0 &&
    value <= MAX_U32
  );
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Accepts a structurally valid ownership record: unique addresses and an
 * integer threshold. The threshold bound is not checked here; it is an
 * invariant of whoever produced the record.
 */
export function isOwnership(value: unknown): value is Ownership {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!Array.isArray(v.controlKeys)) return false;
  const keys: unknown[] = v.controlKeys;
  if (!keys.every(isAddress)) return false;
  if (new Set(keys).size !== keys.length) return false;
  return (
    typeof v.threshold === "number" &&
    Number.isInteger(v.threshold) &&
    v.threshold >= 0
  );
}
