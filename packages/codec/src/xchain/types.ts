/**
 * Exchange-chain transaction model.
 */

import type {
  BaseTxFields,
  Input,
  OutputOwners,
  TransferableInput,
  TransferableOutput,
  TransferOutput,
  UtxoId,
} from "../components.js";

export const XCHAIN_TYPE_IDS = {
  BaseTx: 0,
  CreateAssetTx: 1,
  OperationTx: 2,
  ImportTx: 3,
  ExportTx: 4,
} as const;

export type XChainTxType = keyof typeof XCHAIN_TYPE_IDS;

/** Output held in an asset's initial state. */
export type InitialOutput =
  | ({ readonly kind: "transfer" } & TransferOutput)
  | ({ readonly kind: "mint" } & OutputOwners);

export interface InitialState {
  readonly fxIndex: number;
  readonly outputs: readonly InitialOutput[];
}

export interface MintOperation {
  readonly mintInput: Input;
  readonly mintOutput: OutputOwners;
  readonly transferOutput: TransferOutput;
}

export interface Operation {
  readonly assetId: Uint8Array;
  readonly utxoIds: readonly UtxoId[];
  readonly op: MintOperation;
}

export interface XChainBaseTx {
  readonly type: "BaseTx";
  readonly baseTx: BaseTxFields;
}

export interface CreateAssetTx {
  readonly type: "CreateAssetTx";
  readonly baseTx: BaseTxFields;
  readonly name: string;
  readonly symbol: string;
  readonly denomination: number;
  readonly initialStates: readonly InitialState[];
}

export interface OperationTx {
  readonly type: "OperationTx";
  readonly baseTx: BaseTxFields;
  readonly operations: readonly Operation[];
}

export interface XChainImportTx {
  readonly type: "ImportTx";
  readonly baseTx: BaseTxFields;
  readonly sourceChain: Uint8Array;
  readonly importedInputs: readonly TransferableInput[];
}

export interface XChainExportTx {
  readonly type: "ExportTx";
  readonly baseTx: BaseTxFields;
  readonly destinationChain: Uint8Array;
  readonly exportedOutputs: readonly TransferableOutput[];
}

export type XChainUnsignedTx =
  | XChainBaseTx
  | CreateAssetTx
  | OperationTx
  | XChainImportTx
  | XChainExportTx;
