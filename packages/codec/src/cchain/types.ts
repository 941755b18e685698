/**
 * Contract-chain atomic transactions.
 *
 * Only the import and export transactions that move funds between the
 * contract chain and the UTXO chains use the shared binary format.
 */

import type { TransferableInput, TransferableOutput } from "../components.js";

export const CCHAIN_TYPE_IDS = {
  ImportTx: 0,
  ExportTx: 1,
} as const;

export type CChainTxType = keyof typeof CCHAIN_TYPE_IDS;

export const EVM_ADDRESS_LEN = 20;

export interface EvmOutput {
  readonly address: Uint8Array;
  readonly amount: bigint;
  readonly assetId: Uint8Array;
}

export interface EvmInput extends EvmOutput {
  readonly nonce: bigint;
}

export interface CChainImportTx {
  readonly type: "ImportTx";
  readonly networkId: number;
  readonly blockchainId: Uint8Array;
  readonly sourceChain: Uint8Array;
  readonly importedInputs: readonly TransferableInput[];
  readonly outputs: readonly EvmOutput[];
}

export interface CChainExportTx {
  readonly type: "ExportTx";
  readonly networkId: number;
  readonly blockchainId: Uint8Array;
  readonly destinationChain: Uint8Array;
  readonly inputs: readonly EvmInput[];
  readonly exportedOutputs: readonly TransferableOutput[];
}

export type CChainUnsignedTx = CChainImportTx | CChainExportTx;
