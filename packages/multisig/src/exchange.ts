/**
 * Offline exchange.
 *
 * A signed transaction travels between signer machines as its canonical
 * chain encoding: raw bytes, or a text file holding those bytes in
 * lowercase hex followed by a newline. There is no header or checksum.
 */

import { readFile, writeFile } from "node:fs/promises";
import type { DecodedSignedPChainTx, SignedPChainTx } from "@subnetkit/codec";
import { decodeSignedPChainTx, encodeSignedPChainTx, fromHex, toHex } from "@subnetkit/codec";

export function signedTxToBytes(tx: SignedPChainTx): Uint8Array {
  return encodeSignedPChainTx(tx);
}

export function signedTxFromBytes(bytes: Uint8Array): DecodedSignedPChainTx {
  return decodeSignedPChainTx(bytes);
}

export function signedTxToText(tx: SignedPChainTx): string {
  return `${toHex(signedTxToBytes(tx))}\n`;
}

/**
 * Accepts surrounding whitespace and an optional `0x` prefix.
 */
export function signedTxFromText(text: string): DecodedSignedPChainTx {
  return signedTxFromBytes(fromHex(text));
}

export async function writeSignedTxFile(path: string, tx: SignedPChainTx): Promise<void> {
  await writeFile(path, signedTxToText(tx), "utf8");
}

export async function readSignedTxFile(path: string): Promise<DecodedSignedPChainTx> {
  return signedTxFromText(await readFile(path, "utf8"));
}
