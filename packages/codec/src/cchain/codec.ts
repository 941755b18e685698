/**
 * Contract-chain atomic transaction codec.
 */

import { assertNever } from "../assert.js";
import { transferableInputs, transferableOutputs } from "../components.js";
import { ID_LEN } from "../encoding.js";
import { TransactionCodecError } from "../errors.js";
import { readCodecVersion, writeCodecVersion } from "../framing.js";
import { decodeWith, encodeWith, type Codec, type Reader, type Writer } from "../packer.js";
import {
  CCHAIN_TYPE_IDS,
  EVM_ADDRESS_LEN,
  type CChainUnsignedTx,
  type EvmInput,
  type EvmOutput,
} from "./types.js";

const EVM_OUTPUT_LEN = EVM_ADDRESS_LEN + 8 + ID_LEN;
const EVM_INPUT_LEN = EVM_OUTPUT_LEN + 8;

const evmOutput: Codec<EvmOutput> = {
  encode: (w, v) => {
    w.fixed(v.address, EVM_ADDRESS_LEN).u64(v.amount).fixed(v.assetId, ID_LEN);
  },
  decode: (r) => ({
    address: r.fixed(EVM_ADDRESS_LEN),
    amount: r.u64(),
    assetId: r.fixed(ID_LEN),
  }),
};

const evmInput: Codec<EvmInput> = {
  encode: (w, v) => {
    evmOutput.encode(w, v);
    w.u64(v.nonce);
  },
  decode: (r) => {
    const out = evmOutput.decode(r);
    return { ...out, nonce: r.u64() };
  },
};

function encodeBody(w: Writer, tx: CChainUnsignedTx): void {
  w.u32(tx.networkId).fixed(tx.blockchainId, ID_LEN);
  switch (tx.type) {
    case "ImportTx":
      w.fixed(tx.sourceChain, ID_LEN);
      transferableInputs.encode(w, tx.importedInputs);
      w.array(tx.outputs, evmOutput.encode);
      return;
    case "ExportTx":
      w.fixed(tx.destinationChain, ID_LEN);
      w.array(tx.inputs, evmInput.encode);
      transferableOutputs.encode(w, tx.exportedOutputs);
      return;
    default:
      assertNever(tx, "C-chain transaction");
  }
}

function decodeBody(r: Reader, typeId: number): CChainUnsignedTx {
  switch (typeId) {
    case CCHAIN_TYPE_IDS.ImportTx:
      return {
        type: "ImportTx",
        networkId: r.u32(),
        blockchainId: r.fixed(ID_LEN),
        sourceChain: r.fixed(ID_LEN),
        importedInputs: transferableInputs.decode(r),
        outputs: r.array(evmOutput.decode, EVM_OUTPUT_LEN),
      };
    case CCHAIN_TYPE_IDS.ExportTx:
      return {
        type: "ExportTx",
        networkId: r.u32(),
        blockchainId: r.fixed(ID_LEN),
        destinationChain: r.fixed(ID_LEN),
        inputs: r.array(evmInput.decode, EVM_INPUT_LEN),
        exportedOutputs: transferableOutputs.decode(r),
      };
    default:
      throw new TransactionCodecError(
        "UNKNOWN_TYPE_ID",
        `unknown C-chain transaction type ID ${typeId}`,
      );
  }
}

export const cchainUnsignedTx: Codec<CChainUnsignedTx> = {
  encode: (w, tx) => {
    writeCodecVersion(w);
    w.u32(CCHAIN_TYPE_IDS[tx.type]);
    encodeBody(w, tx);
  },
  decode: (r) => {
    readCodecVersion(r);
    return decodeBody(r, r.u32());
  },
};

export function encodeCChainUnsignedTx(tx: CChainUnsignedTx): Uint8Array {
  return encodeWith(cchainUnsignedTx, tx);
}

export function decodeCChainUnsignedTx(bytes: Uint8Array): CChainUnsignedTx {
  return decodeWith(cchainUnsignedTx, bytes);
}

/** The network ID sits at the front of both variants. */
export function getCChainNetworkId(tx: CChainUnsignedTx): number {
  switch (tx.type) {
    case "ImportTx":
      return tx.networkId;
    case "ExportTx":
      return tx.networkId;
    default:
      return assertNever(tx, "C-chain transaction");
  }
}
