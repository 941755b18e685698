/**
 * Subnet authorization extraction.
 */

import { assertNever } from "../assert.js";
import type { Input } from "../components.js";
import type { PChainTxType, PChainUnsignedTx } from "./types.js";

/** Kinds that change a subnet and so carry a `subnetAuth` input. */
export const SUBNET_AUTH_KINDS = [
  "AddSubnetValidatorTx",
  "CreateChainTx",
  "RemoveSubnetValidatorTx",
  "TransformSubnetTx",
  "TransferSubnetOwnershipTx",
  "ConvertSubnetToL1Tx",
] as const satisfies readonly PChainTxType[];

export type SubnetAuthTxType = (typeof SUBNET_AUTH_KINDS)[number];

export type SubnetAuthTx = Extract<PChainUnsignedTx, { type: SubnetAuthTxType }>;

export function getPChainTxKind(tx: PChainUnsignedTx): PChainTxType {
  return tx.type;
}

export function isSubnetAuthTx(tx: PChainUnsignedTx): tx is SubnetAuthTx {
  return getSubnetAuth(tx) !== undefined;
}

export function getPChainNetworkId(tx: PChainUnsignedTx): number {
  return tx.baseTx.networkId;
}

/**
 * The subnet authorization input, or undefined for kinds that need none.
 */
export function getSubnetAuth(tx: PChainUnsignedTx): Input | undefined {
  switch (tx.type) {
    case "AddSubnetValidatorTx":
    case "CreateChainTx":
    case "RemoveSubnetValidatorTx":
    case "TransformSubnetTx":
    case "TransferSubnetOwnershipTx":
    case "ConvertSubnetToL1Tx":
      return tx.subnetAuth;
    case "AddValidatorTx":
    case "AddDelegatorTx":
    case "CreateSubnetTx":
    case "ImportTx":
    case "ExportTx":
    case "AddPermissionlessValidatorTx":
    case "AddPermissionlessDelegatorTx":
    case "BaseTx":
    case "RegisterL1ValidatorTx":
    case "SetL1ValidatorWeightTx":
    case "IncreaseL1ValidatorBalanceTx":
    case "DisableL1ValidatorTx":
      return undefined;
    default:
      return assertNever(tx, "P-chain transaction");
  }
}

/**
 * The subnet a transaction acts on. Permissionless staking kinds name a
 * subnet without needing its authorization.
 */
export function getSubnetId(tx: PChainUnsignedTx): Uint8Array | undefined {
  switch (tx.type) {
    case "AddSubnetValidatorTx":
    case "CreateChainTx":
    case "RemoveSubnetValidatorTx":
    case "TransformSubnetTx":
    case "TransferSubnetOwnershipTx":
    case "ConvertSubnetToL1Tx":
    case "AddPermissionlessValidatorTx":
    case "AddPermissionlessDelegatorTx":
      return tx.subnetId;
    case "AddValidatorTx":
    case "AddDelegatorTx":
    case "CreateSubnetTx":
    case "ImportTx":
    case "ExportTx":
    case "BaseTx":
    case "RegisterL1ValidatorTx":
    case "SetL1ValidatorWeightTx":
    case "IncreaseL1ValidatorBalanceTx":
    case "DisableL1ValidatorTx":
      return undefined;
    default:
      return assertNever(tx, "P-chain transaction");
  }
}
