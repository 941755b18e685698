/**
 * Exchange-chain unsigned transaction codec.
 */

import { assertNever } from "../assert.js";
import {
  baseTxFields,
  FX_TYPE_IDS,
  inputBody,
  outputOwnersBody,
  transferableInputs,
  transferableOutputs,
  transferOutput,
  transferOutputBody,
  utxoId,
} from "../components.js";
import { ID_LEN } from "../encoding.js";
import { TransactionCodecError } from "../errors.js";
import { readCodecVersion, writeCodecVersion } from "../framing.js";
import {
  decodeWith,
  encodeWith,
  expectTypeId,
  type Codec,
  type Reader,
  type Writer,
} from "../packer.js";
import {
  XCHAIN_TYPE_IDS,
  type InitialOutput,
  type InitialState,
  type Operation,
  type XChainUnsignedTx,
} from "./types.js";

// type ID + locktime + threshold + address count
const MIN_INITIAL_OUTPUT_LEN = 4 + 8 + 4 + 4;
const MIN_INITIAL_STATE_LEN = 4 + 4;
const MIN_UTXO_ID_LEN = ID_LEN + 4;
const MIN_OPERATION_LEN = ID_LEN + 4 + 4 + 4 + (8 + 4 + 4) + (8 + 8 + 4 + 4);

const initialOutput: Codec<InitialOutput> = {
  encode: (w, v) => {
    switch (v.kind) {
      case "transfer":
        transferOutput.encode(w, v);
        return;
      case "mint":
        w.u32(FX_TYPE_IDS.mintOutput);
        outputOwnersBody.encode(w, v);
        return;
      default:
        assertNever(v, "initial output");
    }
  },
  decode: (r) => {
    const typeId = r.u32();
    switch (typeId) {
      case FX_TYPE_IDS.transferOutput:
        return { kind: "transfer", ...transferOutputBody.decode(r) };
      case FX_TYPE_IDS.mintOutput:
        return { kind: "mint", ...outputOwnersBody.decode(r) };
      default:
        throw new TransactionCodecError("UNKNOWN_TYPE_ID", `unknown output type ID ${typeId}`);
    }
  },
};

const initialState: Codec<InitialState> = {
  encode: (w, v) => {
    w.u32(v.fxIndex);
    w.array(v.outputs, initialOutput.encode);
  },
  decode: (r) => ({
    fxIndex: r.u32(),
    outputs: r.array(initialOutput.decode, MIN_INITIAL_OUTPUT_LEN),
  }),
};

const operation: Codec<Operation> = {
  encode: (w, v) => {
    w.fixed(v.assetId, ID_LEN);
    w.array(v.utxoIds, utxoId.encode);
    w.u32(FX_TYPE_IDS.mintOperation);
    inputBody.encode(w, v.op.mintInput);
    outputOwnersBody.encode(w, v.op.mintOutput);
    transferOutputBody.encode(w, v.op.transferOutput);
  },
  decode: (r) => {
    const assetId = r.fixed(ID_LEN);
    const utxoIds = r.array(utxoId.decode, MIN_UTXO_ID_LEN);
    expectTypeId(r, FX_TYPE_IDS.mintOperation, "operation");
    return {
      assetId,
      utxoIds,
      op: {
        mintInput: inputBody.decode(r),
        mintOutput: outputOwnersBody.decode(r),
        transferOutput: transferOutputBody.decode(r),
      },
    };
  },
};

function encodeBody(w: Writer, tx: XChainUnsignedTx): void {
  baseTxFields.encode(w, tx.baseTx);
  switch (tx.type) {
    case "BaseTx":
      return;
    case "CreateAssetTx":
      w.str(tx.name).str(tx.symbol).u8(tx.denomination);
      w.array(tx.initialStates, initialState.encode);
      return;
    case "OperationTx":
      w.array(tx.operations, operation.encode);
      return;
    case "ImportTx":
      w.fixed(tx.sourceChain, ID_LEN);
      transferableInputs.encode(w, tx.importedInputs);
      return;
    case "ExportTx":
      w.fixed(tx.destinationChain, ID_LEN);
      transferableOutputs.encode(w, tx.exportedOutputs);
      return;
    default:
      assertNever(tx, "X-chain transaction");
  }
}

function decodeBody(r: Reader, typeId: number): XChainUnsignedTx {
  switch (typeId) {
    case XCHAIN_TYPE_IDS.BaseTx:
      return { type: "BaseTx", baseTx: baseTxFields.decode(r) };
    case XCHAIN_TYPE_IDS.CreateAssetTx:
      return {
        type: "CreateAssetTx",
        baseTx: baseTxFields.decode(r),
        name: r.str(),
        symbol: r.str(),
        denomination: r.u8(),
        initialStates: r.array(initialState.decode, MIN_INITIAL_STATE_LEN),
      };
    case XCHAIN_TYPE_IDS.OperationTx:
      return {
        type: "OperationTx",
        baseTx: baseTxFields.decode(r),
        operations: r.array(operation.decode, MIN_OPERATION_LEN),
      };
    case XCHAIN_TYPE_IDS.ImportTx:
      return {
        type: "ImportTx",
        baseTx: baseTxFields.decode(r),
        sourceChain: r.fixed(ID_LEN),
        importedInputs: transferableInputs.decode(r),
      };
    case XCHAIN_TYPE_IDS.ExportTx:
      return {
        type: "ExportTx",
        baseTx: baseTxFields.decode(r),
        destinationChain: r.fixed(ID_LEN),
        exportedOutputs: transferableOutputs.decode(r),
      };
    default:
      throw new TransactionCodecError(
        "UNKNOWN_TYPE_ID",
        `unknown X-chain transaction type ID ${typeId}`,
      );
  }
}

export const xchainUnsignedTx: Codec<XChainUnsignedTx> = {
  encode: (w, tx) => {
    writeCodecVersion(w);
    w.u32(XCHAIN_TYPE_IDS[tx.type]);
    encodeBody(w, tx);
  },
  decode: (r) => {
    readCodecVersion(r);
    return decodeBody(r, r.u32());
  },
};

export function encodeXChainUnsignedTx(tx: XChainUnsignedTx): Uint8Array {
  return encodeWith(xchainUnsignedTx, tx);
}

export function decodeXChainUnsignedTx(bytes: Uint8Array): XChainUnsignedTx {
  return decodeWith(xchainUnsignedTx, bytes);
}

export function getXChainNetworkId(tx: XChainUnsignedTx): number {
  return tx.baseTx.networkId;
}
