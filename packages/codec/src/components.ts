/**
 * Shared transaction components.
 *
 * The secp256k1 feature-extension types and the UTXO plumbing that all
 * three chain formats embed. Interface-typed fields (outputs, inputs,
 * owners, credentials) are written with their u32 type ID in front.
 */

import { ID_LEN, NODE_ID_LEN, SHORT_ID_LEN } from "./encoding.js";
import { expectTypeId, type Codec, type Reader, type Writer } from "./packer.js";

/**
 * secp256k1fx type IDs. All three chains use the transfer input, transfer
 * output and credential IDs; the mint IDs appear only in exchange-chain
 * transactions and Input/OutputOwners only in platform-chain ones.
 */
export const FX_TYPE_IDS = {
  transferInput: 5,
  mintOutput: 6,
  transferOutput: 7,
  mintOperation: 8,
  credential: 9,
  input: 10,
  outputOwners: 11,
} as const;

export const SIGNATURE_LEN = 65;

/** An unfilled credential slot. */
export const EMPTY_SIGNATURE: Uint8Array = new Uint8Array(SIGNATURE_LEN);

// =============================================================================
// Types
// =============================================================================

export interface OutputOwners {
  readonly locktime: bigint;
  readonly threshold: number;
  readonly addresses: readonly Uint8Array[];
}

export interface TransferOutput extends OutputOwners {
  readonly amount: bigint;
}

/** Signature indices into the owners of whatever is being spent or authorized. */
export interface Input {
  readonly sigIndices: readonly number[];
}

export interface TransferInput extends Input {
  readonly amount: bigint;
}

export interface UtxoId {
  readonly txId: Uint8Array;
  readonly outputIndex: number;
}

export interface TransferableOutput {
  readonly assetId: Uint8Array;
  readonly output: TransferOutput;
}

export interface TransferableInput {
  readonly utxoId: UtxoId;
  readonly assetId: Uint8Array;
  readonly input: TransferInput;
}

/** Fields common to every P- and X-chain transaction. */
export interface BaseTxFields {
  readonly networkId: number;
  readonly blockchainId: Uint8Array;
  readonly outputs: readonly TransferableOutput[];
  readonly inputs: readonly TransferableInput[];
  readonly memo: Uint8Array;
}

export interface Validator {
  readonly nodeId: Uint8Array;
  readonly startTime: bigint;
  readonly endTime: bigint;
  readonly weight: bigint;
}

/** One signature slot per owner index of the input it authorizes. */
export interface Credential {
  readonly signatures: readonly Uint8Array[];
}

// =============================================================================
// Codecs
// =============================================================================

// Smallest encodings, used to bound array counts before decoding
const MIN_OUTPUT_LEN = ID_LEN + 4 + 8 + 8 + 4 + 4;
const MIN_INPUT_LEN = ID_LEN + 4 + ID_LEN + 4 + 8 + 4;

const shortIds = {
  encode: (w: Writer, ids: readonly Uint8Array[]): void => {
    w.array(ids, (iw, id) => iw.fixed(id, SHORT_ID_LEN));
  },
  decode: (r: Reader): Uint8Array[] => r.array((ir) => ir.fixed(SHORT_ID_LEN), SHORT_ID_LEN),
};

export const ids32 = {
  encode: (w: Writer, ids: readonly Uint8Array[]): void => {
    w.array(ids, (iw, id) => iw.fixed(id, ID_LEN));
  },
  decode: (r: Reader): Uint8Array[] => r.array((ir) => ir.fixed(ID_LEN), ID_LEN),
};

/** OutputOwners body (no type ID). */
export const outputOwnersBody: Codec<OutputOwners> = {
  encode: (w, v) => {
    w.u64(v.locktime).u32(v.threshold);
    shortIds.encode(w, v.addresses);
  },
  decode: (r) => ({
    locktime: r.u64(),
    threshold: r.u32(),
    addresses: shortIds.decode(r),
  }),
};

/** OutputOwners as an interface value (rewards owners, subnet owners). */
export const outputOwners: Codec<OutputOwners> = {
  encode: (w, v) => {
    w.u32(FX_TYPE_IDS.outputOwners);
    outputOwnersBody.encode(w, v);
  },
  decode: (r) => {
    expectTypeId(r, FX_TYPE_IDS.outputOwners, "owners");
    return outputOwnersBody.decode(r);
  },
};

export const transferOutputBody: Codec<TransferOutput> = {
  encode: (w, v) => {
    w.u64(v.amount);
    outputOwnersBody.encode(w, v);
  },
  decode: (r) => {
    const amount = r.u64();
    return { amount, ...outputOwnersBody.decode(r) };
  },
};

export const transferOutput: Codec<TransferOutput> = {
  encode: (w, v) => {
    w.u32(FX_TYPE_IDS.transferOutput);
    transferOutputBody.encode(w, v);
  },
  decode: (r) => {
    expectTypeId(r, FX_TYPE_IDS.transferOutput, "output");
    return transferOutputBody.decode(r);
  },
};

export const inputBody: Codec<Input> = {
  encode: (w, v) => {
    w.array(v.sigIndices, (iw, idx) => iw.u32(idx));
  },
  decode: (r) => ({ sigIndices: r.array((ir) => ir.u32(), 4) }),
};

/** Input as an interface value (subnet and disable authorizations). */
export const authInput: Codec<Input> = {
  encode: (w, v) => {
    w.u32(FX_TYPE_IDS.input);
    inputBody.encode(w, v);
  },
  decode: (r) => {
    expectTypeId(r, FX_TYPE_IDS.input, "auth input");
    return inputBody.decode(r);
  },
};

export const transferInput: Codec<TransferInput> = {
  encode: (w, v) => {
    w.u32(FX_TYPE_IDS.transferInput).u64(v.amount);
    inputBody.encode(w, v);
  },
  decode: (r) => {
    expectTypeId(r, FX_TYPE_IDS.transferInput, "input");
    const amount = r.u64();
    return { amount, ...inputBody.decode(r) };
  },
};

export const utxoId: Codec<UtxoId> = {
  encode: (w, v) => {
    w.fixed(v.txId, ID_LEN).u32(v.outputIndex);
  },
  decode: (r) => ({ txId: r.fixed(ID_LEN), outputIndex: r.u32() }),
};

export const transferableOutput: Codec<TransferableOutput> = {
  encode: (w, v) => {
    w.fixed(v.assetId, ID_LEN);
    transferOutput.encode(w, v.output);
  },
  decode: (r) => ({ assetId: r.fixed(ID_LEN), output: transferOutput.decode(r) }),
};

export const transferableInput: Codec<TransferableInput> = {
  encode: (w, v) => {
    utxoId.encode(w, v.utxoId);
    w.fixed(v.assetId, ID_LEN);
    transferInput.encode(w, v.input);
  },
  decode: (r) => ({
    utxoId: utxoId.decode(r),
    assetId: r.fixed(ID_LEN),
    input: transferInput.decode(r),
  }),
};

export const transferableOutputs = {
  encode: (w: Writer, outs: readonly TransferableOutput[]): void => {
    w.array(outs, transferableOutput.encode);
  },
  decode: (r: Reader): TransferableOutput[] => r.array(transferableOutput.decode, MIN_OUTPUT_LEN),
};

export const transferableInputs = {
  encode: (w: Writer, ins: readonly TransferableInput[]): void => {
    w.array(ins, transferableInput.encode);
  },
  decode: (r: Reader): TransferableInput[] => r.array(transferableInput.decode, MIN_INPUT_LEN),
};

export const baseTxFields: Codec<BaseTxFields> = {
  encode: (w, v) => {
    w.u32(v.networkId).fixed(v.blockchainId, ID_LEN);
    transferableOutputs.encode(w, v.outputs);
    transferableInputs.encode(w, v.inputs);
    w.varBytes(v.memo);
  },
  decode: (r) => ({
    networkId: r.u32(),
    blockchainId: r.fixed(ID_LEN),
    outputs: transferableOutputs.decode(r),
    inputs: transferableInputs.decode(r),
    memo: r.varBytes(),
  }),
};

export const validator: Codec<Validator> = {
  encode: (w, v) => {
    w.fixed(v.nodeId, NODE_ID_LEN).u64(v.startTime).u64(v.endTime).u64(v.weight);
  },
  decode: (r) => ({
    nodeId: r.fixed(NODE_ID_LEN),
    startTime: r.u64(),
    endTime: r.u64(),
    weight: r.u64(),
  }),
};

export const credential: Codec<Credential> = {
  encode: (w, v) => {
    w.u32(FX_TYPE_IDS.credential);
    w.array(v.signatures, (sw, sig) => sw.fixed(sig, SIGNATURE_LEN));
  },
  decode: (r) => {
    expectTypeId(r, FX_TYPE_IDS.credential, "credential");
    return { signatures: r.array((sr) => sr.fixed(SIGNATURE_LEN), SIGNATURE_LEN) };
  },
};

export const MIN_CREDENTIAL_LEN = 4 + 4;
