/**
 * Platform-chain transaction model.
 *
 * Every variant embeds the common base fields (network, blockchain, funding
 * inputs and change outputs). Subnet-changing variants also carry a
 * `subnetAuth` input whose signature indices point into the subnet's
 * control keys.
 */

import type {
  BaseTxFields,
  Input,
  OutputOwners,
  TransferableInput,
  TransferableOutput,
  Validator,
} from "../components.js";

export const PCHAIN_TYPE_IDS = {
  AddValidatorTx: 12,
  AddSubnetValidatorTx: 13,
  AddDelegatorTx: 14,
  CreateChainTx: 15,
  CreateSubnetTx: 16,
  ImportTx: 17,
  ExportTx: 18,
  RemoveSubnetValidatorTx: 23,
  TransformSubnetTx: 24,
  AddPermissionlessValidatorTx: 25,
  AddPermissionlessDelegatorTx: 26,
  TransferSubnetOwnershipTx: 33,
  BaseTx: 34,
  ConvertSubnetToL1Tx: 35,
  RegisterL1ValidatorTx: 36,
  SetL1ValidatorWeightTx: 37,
  IncreaseL1ValidatorBalanceTx: 38,
  DisableL1ValidatorTx: 39,
} as const;

export type PChainTxType = keyof typeof PCHAIN_TYPE_IDS;

/** Proof-of-possession signer type IDs. */
export const SIGNER_TYPE_IDS = {
  empty: 27,
  proofOfPossession: 28,
} as const;

export const BLS_PUBLIC_KEY_LEN = 48;
export const BLS_SIGNATURE_LEN = 96;

export interface ProofOfPossession {
  readonly publicKey: Uint8Array;
  readonly signature: Uint8Array;
}

export type PermissionlessSigner =
  | { readonly kind: "empty" }
  | ({ readonly kind: "proofOfPossession" } & ProofOfPossession);

/** Owner of an L1 validator's leftover balance or deactivation right. */
export interface PChainOwner {
  readonly threshold: number;
  readonly addresses: readonly Uint8Array[];
}

export interface L1Validator {
  readonly nodeId: Uint8Array;
  readonly weight: bigint;
  readonly balance: bigint;
  readonly signer: ProofOfPossession;
  readonly remainingBalanceOwner: PChainOwner;
  readonly deactivationOwner: PChainOwner;
}

// =============================================================================
// Variants
// =============================================================================

export interface AddValidatorTx {
  readonly type: "AddValidatorTx";
  readonly baseTx: BaseTxFields;
  readonly validator: Validator;
  readonly stake: readonly TransferableOutput[];
  readonly rewardsOwner: OutputOwners;
  readonly delegationShares: number;
}

export interface AddSubnetValidatorTx {
  readonly type: "AddSubnetValidatorTx";
  readonly baseTx: BaseTxFields;
  readonly validator: Validator;
  readonly subnetId: Uint8Array;
  readonly subnetAuth: Input;
}

export interface AddDelegatorTx {
  readonly type: "AddDelegatorTx";
  readonly baseTx: BaseTxFields;
  readonly validator: Validator;
  readonly stake: readonly TransferableOutput[];
  readonly rewardsOwner: OutputOwners;
}

export interface CreateChainTx {
  readonly type: "CreateChainTx";
  readonly baseTx: BaseTxFields;
  readonly subnetId: Uint8Array;
  readonly chainName: string;
  readonly vmId: Uint8Array;
  readonly fxIds: readonly Uint8Array[];
  readonly genesisData: Uint8Array;
  readonly subnetAuth: Input;
}

export interface CreateSubnetTx {
  readonly type: "CreateSubnetTx";
  readonly baseTx: BaseTxFields;
  readonly owner: OutputOwners;
}

export interface PChainImportTx {
  readonly type: "ImportTx";
  readonly baseTx: BaseTxFields;
  readonly sourceChain: Uint8Array;
  readonly importedInputs: readonly TransferableInput[];
}

export interface PChainExportTx {
  readonly type: "ExportTx";
  readonly baseTx: BaseTxFields;
  readonly destinationChain: Uint8Array;
  readonly exportedOutputs: readonly TransferableOutput[];
}

export interface RemoveSubnetValidatorTx {
  readonly type: "RemoveSubnetValidatorTx";
  readonly baseTx: BaseTxFields;
  readonly nodeId: Uint8Array;
  readonly subnetId: Uint8Array;
  readonly subnetAuth: Input;
}

export interface TransformSubnetTx {
  readonly type: "TransformSubnetTx";
  readonly baseTx: BaseTxFields;
  readonly subnetId: Uint8Array;
  readonly assetId: Uint8Array;
  readonly initialSupply: bigint;
  readonly maximumSupply: bigint;
  readonly minConsumptionRate: bigint;
  readonly maxConsumptionRate: bigint;
  readonly minValidatorStake: bigint;
  readonly maxValidatorStake: bigint;
  readonly minStakeDuration: number;
  readonly maxStakeDuration: number;
  readonly minDelegationFee: number;
  readonly minDelegatorStake: bigint;
  readonly maxValidatorWeightFactor: number;
  readonly uptimeRequirement: number;
  readonly subnetAuth: Input;
}

export interface AddPermissionlessValidatorTx {
  readonly type: "AddPermissionlessValidatorTx";
  readonly baseTx: BaseTxFields;
  readonly validator: Validator;
  readonly subnetId: Uint8Array;
  readonly signer: PermissionlessSigner;
  readonly stake: readonly TransferableOutput[];
  readonly validatorRewardsOwner: OutputOwners;
  readonly delegatorRewardsOwner: OutputOwners;
  readonly delegationShares: number;
}

export interface AddPermissionlessDelegatorTx {
  readonly type: "AddPermissionlessDelegatorTx";
  readonly baseTx: BaseTxFields;
  readonly validator: Validator;
  readonly subnetId: Uint8Array;
  readonly stake: readonly TransferableOutput[];
  readonly rewardsOwner: OutputOwners;
}

export interface TransferSubnetOwnershipTx {
  readonly type: "TransferSubnetOwnershipTx";
  readonly baseTx: BaseTxFields;
  readonly subnetId: Uint8Array;
  readonly subnetAuth: Input;
  readonly owner: OutputOwners;
}

export interface PChainBaseTx {
  readonly type: "BaseTx";
  readonly baseTx: BaseTxFields;
}

export interface ConvertSubnetToL1Tx {
  readonly type: "ConvertSubnetToL1Tx";
  readonly baseTx: BaseTxFields;
  readonly subnetId: Uint8Array;
  readonly chainId: Uint8Array;
  readonly address: Uint8Array;
  readonly validators: readonly L1Validator[];
  readonly subnetAuth: Input;
}

export interface RegisterL1ValidatorTx {
  readonly type: "RegisterL1ValidatorTx";
  readonly baseTx: BaseTxFields;
  readonly balance: bigint;
  readonly proofOfPossession: Uint8Array;
  readonly message: Uint8Array;
}

export interface SetL1ValidatorWeightTx {
  readonly type: "SetL1ValidatorWeightTx";
  readonly baseTx: BaseTxFields;
  readonly message: Uint8Array;
}

export interface IncreaseL1ValidatorBalanceTx {
  readonly type: "IncreaseL1ValidatorBalanceTx";
  readonly baseTx: BaseTxFields;
  readonly validationId: Uint8Array;
  readonly balance: bigint;
}

export interface DisableL1ValidatorTx {
  readonly type: "DisableL1ValidatorTx";
  readonly baseTx: BaseTxFields;
  readonly validationId: Uint8Array;
  readonly disableAuth: Input;
}

export type PChainUnsignedTx =
  | AddValidatorTx
  | AddSubnetValidatorTx
  | AddDelegatorTx
  | CreateChainTx
  | CreateSubnetTx
  | PChainImportTx
  | PChainExportTx
  | RemoveSubnetValidatorTx
  | TransformSubnetTx
  | AddPermissionlessValidatorTx
  | AddPermissionlessDelegatorTx
  | TransferSubnetOwnershipTx
  | PChainBaseTx
  | ConvertSubnetToL1Tx
  | RegisterL1ValidatorTx
  | SetL1ValidatorWeightTx
  | IncreaseL1ValidatorBalanceTx
  | DisableL1ValidatorTx;
