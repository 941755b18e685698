/**
 * Identifier and address encodings.
 *
 * - 32-byte IDs render as CB58: base58 of the bytes followed by the last
 *   4 bytes of their sha256.
 * - Addresses render as `<chain alias>-<bech32(hrp, shortId)>` where the
 *   short ID is 20 bytes.
 * - Interchange artifacts use lowercase hex.
 */

import { base58, bech32, hex } from "@scure/base";
import { sha256 } from "@noble/hashes/sha256";
import { concatBytes } from "@noble/hashes/utils";
import type { DefinedChainTag } from "@subnetkit/types";
import { isDefinedChainTag } from "@subnetkit/types";
import { TransactionCodecError } from "./errors.js";

export const ID_LEN = 32;
export const SHORT_ID_LEN = 20;
export const NODE_ID_LEN = 20;

const CHECKSUM_LEN = 4;

// =============================================================================
// Bytes
// =============================================================================

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Lexicographic byte order; shorter prefixes sort first. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

export function isAllZero(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}

// =============================================================================
// Hex
// =============================================================================

export function toHex(bytes: Uint8Array): string {
  return hex.encode(bytes);
}

/**
 * Decode hex text. Surrounding whitespace and a `0x` prefix are accepted.
 */
export function fromHex(text: string): Uint8Array {
  const trimmed = text.trim();
  const body = trimmed.startsWith("0x") || trimmed.startsWith("0X")
    ? trimmed.slice(2)
    : trimmed;
  try {
    return hex.decode(body.toLowerCase());
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransactionCodecError("INVALID_ENCODING", `invalid hex: ${reason}`);
  }
}

// =============================================================================
// CB58
// =============================================================================

export function cb58Encode(bytes: Uint8Array): string {
  const checksum = sha256(bytes).slice(-CHECKSUM_LEN);
  return base58.encode(concatBytes(bytes, checksum));
}

export function cb58Decode(text: string): Uint8Array {
  let raw: Uint8Array;
  try {
    raw = base58.decode(text);
  } catch {
    throw new TransactionCodecError("INVALID_ENCODING", `invalid base58: ${text}`);
  }
  if (raw.length < CHECKSUM_LEN) {
    throw new TransactionCodecError("INVALID_ENCODING", "cb58 value shorter than its checksum");
  }
  const payload = raw.slice(0, raw.length - CHECKSUM_LEN);
  const checksum = raw.slice(raw.length - CHECKSUM_LEN);
  if (!bytesEqual(sha256(payload).slice(-CHECKSUM_LEN), checksum)) {
    throw new TransactionCodecError("INVALID_ENCODING", `bad cb58 checksum: ${text}`);
  }
  return payload;
}

/** Transaction IDs are the sha256 of the signed transaction bytes. */
export function computeTxId(signedBytes: Uint8Array): string {
  return cb58Encode(sha256(signedBytes));
}

// =============================================================================
// Addresses
// =============================================================================

export interface ParsedAddress {
  readonly chain: DefinedChainTag;
  readonly hrp: string;
  readonly shortId: Uint8Array;
}

export function formatAddress(
  chain: DefinedChainTag,
  hrp: string,
  shortId: Uint8Array,
): string {
  if (shortId.length !== SHORT_ID_LEN) {
    throw new TransactionCodecError(
      "INVALID_LENGTH",
      `short ID must be ${SHORT_ID_LEN} bytes, got ${shortId.length}`,
    );
  }
  return `${chain}-${bech32.encode(hrp, bech32.toWords(shortId))}`;
}

export function parseAddress(address: string): ParsedAddress {
  const dash = address.indexOf("-");
  const chain = address.slice(0, dash);
  const body = address.slice(dash + 1);
  if (dash < 0 || !isDefinedChainTag(chain) || !isBech32Text(body)) {
    throw new TransactionCodecError("INVALID_ENCODING", `not a chain address: ${address}`);
  }

  let prefix: string;
  let shortId: Uint8Array;
  try {
    const decoded = bech32.decode(body);
    prefix = decoded.prefix;
    // fromWords rejects leftover padding bits that the checksum does not cover
    shortId = bech32.fromWords(decoded.words);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransactionCodecError("INVALID_ENCODING", `invalid bech32 address ${address}: ${reason}`);
  }

  if (shortId.length !== SHORT_ID_LEN) {
    throw new TransactionCodecError(
      "INVALID_LENGTH",
      `address payload must be ${SHORT_ID_LEN} bytes, got ${shortId.length}`,
    );
  }
  return { chain, hrp: prefix, shortId };
}

function isBech32Text(text: string): text is `${string}1${string}` {
  return text.includes("1");
}
