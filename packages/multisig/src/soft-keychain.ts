/**
 * Software keychain.
 *
 * Holds secp256k1 private keys in memory and signs auth slots for the
 * control keys they derive. A key's identity is its short ID,
 * ripemd160(sha256(compressed public key)); addresses on any chain and
 * network map to the same short ID, so `canSign` ignores alias and HRP.
 *
 * Signatures are 65 bytes: r (32) ‖ s (32) ‖ recovery id (1), over
 * sha256 of the unsigned transaction bytes.
 */

import { secp256k1 } from "@noble/curves/secp256k1";
import { ripemd160 } from "@noble/hashes/ripemd160";
import { sha256 } from "@noble/hashes/sha256";
import type { Address, DefinedChainTag } from "@subnetkit/types";
import {
  SIGNATURE_LEN,
  TransactionCodecError,
  cb58Decode,
  cb58Encode,
  formatAddress,
  parseAddress,
  toHex,
} from "@subnetkit/codec";
import { MultisigError } from "./errors.js";
import type { SigningCapability, SlotSigningRequest } from "./types.js";

const PRIVATE_KEY_PREFIX = "PrivateKey-";
const PRIVATE_KEY_LEN = 32;

export function shortIdFromPublicKey(publicKey: Uint8Array): Uint8Array {
  return ripemd160(sha256(publicKey));
}

/**
 * Parse a raw 32-byte key or its `PrivateKey-<cb58>` text form.
 *
 * @throws MultisigError INVALID_PRIVATE_KEY
 */
export function parsePrivateKey(key: Uint8Array | string): Uint8Array {
  let raw: Uint8Array;
  if (typeof key === "string") {
    if (!key.startsWith(PRIVATE_KEY_PREFIX)) {
      throw new MultisigError("INVALID_PRIVATE_KEY", `Private key must start with ${PRIVATE_KEY_PREFIX}`);
    }
    try {
      raw = cb58Decode(key.slice(PRIVATE_KEY_PREFIX.length));
    } catch (err: unknown) {
      throw new MultisigError("INVALID_PRIVATE_KEY", "Private key is not valid cb58", { cause: err });
    }
  } else {
    raw = key.slice();
  }

  if (raw.length !== PRIVATE_KEY_LEN || !secp256k1.utils.isValidPrivateKey(raw)) {
    throw new MultisigError("INVALID_PRIVATE_KEY", "Not a valid secp256k1 private key");
  }
  return raw;
}

export function formatPrivateKey(key: Uint8Array): string {
  return `${PRIVATE_KEY_PREFIX}${cb58Encode(key)}`;
}

/**
 * Recover the short ID of the key that produced `signature` over
 * `unsignedBytes`.
 */
export function recoverSigner(unsignedBytes: Uint8Array, signature: Uint8Array): Uint8Array {
  if (signature.length !== SIGNATURE_LEN) {
    throw new MultisigError("INVALID_SIGNATURE", `Signature must be ${SIGNATURE_LEN} bytes`);
  }
  const recovery = signature[SIGNATURE_LEN - 1] ?? 0;
  const publicKey = secp256k1.Signature.fromCompact(signature.slice(0, SIGNATURE_LEN - 1))
    .addRecoveryBit(recovery)
    .recoverPublicKey(sha256(unsignedBytes))
    .toRawBytes(true);
  return shortIdFromPublicKey(publicKey);
}

export class SoftKeychain implements SigningCapability {
  // hex short ID → private key
  private readonly keys = new Map<string, Uint8Array>();

  constructor(privateKeys: Iterable<Uint8Array | string> = []) {
    for (const key of privateKeys) {
      this.add(key);
    }
  }

  /** Add a key; returns its short ID. */
  add(key: Uint8Array | string): Uint8Array {
    const privateKey = parsePrivateKey(key);
    const shortId = shortIdFromPublicKey(secp256k1.getPublicKey(privateKey, true));
    this.keys.set(toHex(shortId), privateKey);
    return shortId;
  }

  shortIds(): Uint8Array[] {
    return [...this.keys.values()].map((key) =>
      shortIdFromPublicKey(secp256k1.getPublicKey(key, true)),
    );
  }

  addresses(chain: DefinedChainTag, hrp: string): Address[] {
    return this.shortIds().map((shortId) => formatAddress(chain, hrp, shortId));
  }

  canSign(address: Address): boolean {
    return this.keyFor(address) !== undefined;
  }

  async signSlot(request: SlotSigningRequest): Promise<Uint8Array> {
    const privateKey = this.keyFor(request.address);
    if (privateKey === undefined) {
      throw new MultisigError("NO_USABLE_SIGNER", `No key for ${request.address}`);
    }
    const sig = secp256k1.sign(sha256(request.unsignedBytes), privateKey);
    const out = new Uint8Array(SIGNATURE_LEN);
    out.set(sig.toCompactRawBytes(), 0);
    out[SIGNATURE_LEN - 1] = sig.recovery;
    return out;
  }

  private keyFor(address: Address): Uint8Array | undefined {
    let shortId: Uint8Array;
    try {
      shortId = parseAddress(address).shortId;
    } catch (err: unknown) {
      if (err instanceof TransactionCodecError) return undefined;
      throw err;
    }
    return this.keys.get(toHex(shortId));
  }
}
