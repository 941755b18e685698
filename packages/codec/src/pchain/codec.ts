/**
 * Platform-chain unsigned transaction codec.
 */

import { assertNever } from "../assert.js";
import {
  authInput,
  baseTxFields,
  ids32,
  outputOwners,
  transferableInputs,
  transferableOutputs,
  validator,
} from "../components.js";
import { ID_LEN, NODE_ID_LEN, SHORT_ID_LEN } from "../encoding.js";
import { TransactionCodecError } from "../errors.js";
import { readCodecVersion, writeCodecVersion } from "../framing.js";
import { decodeWith, encodeWith, type Codec, type Reader, type Writer } from "../packer.js";
import {
  BLS_PUBLIC_KEY_LEN,
  BLS_SIGNATURE_LEN,
  PCHAIN_TYPE_IDS,
  SIGNER_TYPE_IDS,
  type L1Validator,
  type PChainOwner,
  type PChainUnsignedTx,
  type PermissionlessSigner,
  type ProofOfPossession,
} from "./types.js";

const MIN_L1_VALIDATOR_LEN =
  4 + 8 + 8 + BLS_PUBLIC_KEY_LEN + BLS_SIGNATURE_LEN + 4 + 4 + 4 + 4;

// =============================================================================
// Field codecs
// =============================================================================

const proofOfPossession: Codec<ProofOfPossession> = {
  encode: (w, v) => {
    w.fixed(v.publicKey, BLS_PUBLIC_KEY_LEN).fixed(v.signature, BLS_SIGNATURE_LEN);
  },
  decode: (r) => ({
    publicKey: r.fixed(BLS_PUBLIC_KEY_LEN),
    signature: r.fixed(BLS_SIGNATURE_LEN),
  }),
};

const permissionlessSigner: Codec<PermissionlessSigner> = {
  encode: (w, v) => {
    switch (v.kind) {
      case "empty":
        w.u32(SIGNER_TYPE_IDS.empty);
        return;
      case "proofOfPossession":
        w.u32(SIGNER_TYPE_IDS.proofOfPossession);
        proofOfPossession.encode(w, v);
        return;
      default:
        assertNever(v, "signer");
    }
  },
  decode: (r) => {
    const typeId = r.u32();
    switch (typeId) {
      case SIGNER_TYPE_IDS.empty:
        return { kind: "empty" };
      case SIGNER_TYPE_IDS.proofOfPossession:
        return { kind: "proofOfPossession", ...proofOfPossession.decode(r) };
      default:
        throw new TransactionCodecError("UNKNOWN_TYPE_ID", `unknown signer type ID ${typeId}`);
    }
  },
};

const pchainOwner: Codec<PChainOwner> = {
  encode: (w, v) => {
    w.u32(v.threshold);
    w.array(v.addresses, (aw, addr) => aw.fixed(addr, SHORT_ID_LEN));
  },
  decode: (r) => ({
    threshold: r.u32(),
    addresses: r.array((ar) => ar.fixed(SHORT_ID_LEN), SHORT_ID_LEN),
  }),
};

const l1Validator: Codec<L1Validator> = {
  encode: (w, v) => {
    w.varBytes(v.nodeId).u64(v.weight).u64(v.balance);
    proofOfPossession.encode(w, v.signer);
    pchainOwner.encode(w, v.remainingBalanceOwner);
    pchainOwner.encode(w, v.deactivationOwner);
  },
  decode: (r) => ({
    nodeId: r.varBytes(),
    weight: r.u64(),
    balance: r.u64(),
    signer: proofOfPossession.decode(r),
    remainingBalanceOwner: pchainOwner.decode(r),
    deactivationOwner: pchainOwner.decode(r),
  }),
};

// =============================================================================
// Transaction codec
// =============================================================================

function encodeBody(w: Writer, tx: PChainUnsignedTx): void {
  baseTxFields.encode(w, tx.baseTx);
  switch (tx.type) {
    case "AddValidatorTx":
      validator.encode(w, tx.validator);
      transferableOutputs.encode(w, tx.stake);
      outputOwners.encode(w, tx.rewardsOwner);
      w.u32(tx.delegationShares);
      return;
    case "AddSubnetValidatorTx":
      validator.encode(w, tx.validator);
      w.fixed(tx.subnetId, ID_LEN);
      authInput.encode(w, tx.subnetAuth);
      return;
    case "AddDelegatorTx":
      validator.encode(w, tx.validator);
      transferableOutputs.encode(w, tx.stake);
      outputOwners.encode(w, tx.rewardsOwner);
      return;
    case "CreateChainTx":
      w.fixed(tx.subnetId, ID_LEN).str(tx.chainName).fixed(tx.vmId, ID_LEN);
      ids32.encode(w, tx.fxIds);
      w.varBytes(tx.genesisData);
      authInput.encode(w, tx.subnetAuth);
      return;
    case "CreateSubnetTx":
      outputOwners.encode(w, tx.owner);
      return;
    case "ImportTx":
      w.fixed(tx.sourceChain, ID_LEN);
      transferableInputs.encode(w, tx.importedInputs);
      return;
    case "ExportTx":
      w.fixed(tx.destinationChain, ID_LEN);
      transferableOutputs.encode(w, tx.exportedOutputs);
      return;
    case "RemoveSubnetValidatorTx":
      w.fixed(tx.nodeId, NODE_ID_LEN).fixed(tx.subnetId, ID_LEN);
      authInput.encode(w, tx.subnetAuth);
      return;
    case "TransformSubnetTx":
      w.fixed(tx.subnetId, ID_LEN)
        .fixed(tx.assetId, ID_LEN)
        .u64(tx.initialSupply)
        .u64(tx.maximumSupply)
        .u64(tx.minConsumptionRate)
        .u64(tx.maxConsumptionRate)
        .u64(tx.minValidatorStake)
        .u64(tx.maxValidatorStake)
        .u32(tx.minStakeDuration)
        .u32(tx.maxStakeDuration)
        .u32(tx.minDelegationFee)
        .u64(tx.minDelegatorStake)
        .u8(tx.maxValidatorWeightFactor)
        .u32(tx.uptimeRequirement);
      authInput.encode(w, tx.subnetAuth);
      return;
    case "AddPermissionlessValidatorTx":
      validator.encode(w, tx.validator);
      w.fixed(tx.subnetId, ID_LEN);
      permissionlessSigner.encode(w, tx.signer);
      transferableOutputs.encode(w, tx.stake);
      outputOwners.encode(w, tx.validatorRewardsOwner);
      outputOwners.encode(w, tx.delegatorRewardsOwner);
      w.u32(tx.delegationShares);
      return;
    case "AddPermissionlessDelegatorTx":
      validator.encode(w, tx.validator);
      w.fixed(tx.subnetId, ID_LEN);
      transferableOutputs.encode(w, tx.stake);
      outputOwners.encode(w, tx.rewardsOwner);
      return;
    case "TransferSubnetOwnershipTx":
      w.fixed(tx.subnetId, ID_LEN);
      authInput.encode(w, tx.subnetAuth);
      outputOwners.encode(w, tx.owner);
      return;
    case "BaseTx":
      return;
    case "ConvertSubnetToL1Tx":
      w.fixed(tx.subnetId, ID_LEN).fixed(tx.chainId, ID_LEN).varBytes(tx.address);
      w.array(tx.validators, l1Validator.encode);
      authInput.encode(w, tx.subnetAuth);
      return;
    case "RegisterL1ValidatorTx":
      w.u64(tx.balance).fixed(tx.proofOfPossession, BLS_SIGNATURE_LEN).varBytes(tx.message);
      return;
    case "SetL1ValidatorWeightTx":
      w.varBytes(tx.message);
      return;
    case "IncreaseL1ValidatorBalanceTx":
      w.fixed(tx.validationId, ID_LEN).u64(tx.balance);
      return;
    case "DisableL1ValidatorTx":
      w.fixed(tx.validationId, ID_LEN);
      authInput.encode(w, tx.disableAuth);
      return;
    default:
      assertNever(tx, "P-chain transaction");
  }
}

function decodeBody(r: Reader, typeId: number): PChainUnsignedTx {
  switch (typeId) {
    case PCHAIN_TYPE_IDS.AddValidatorTx:
      return {
        type: "AddValidatorTx",
        baseTx: baseTxFields.decode(r),
        validator: validator.decode(r),
        stake: transferableOutputs.decode(r),
        rewardsOwner: outputOwners.decode(r),
        delegationShares: r.u32(),
      };
    case PCHAIN_TYPE_IDS.AddSubnetValidatorTx:
      return {
        type: "AddSubnetValidatorTx",
        baseTx: baseTxFields.decode(r),
        validator: validator.decode(r),
        subnetId: r.fixed(ID_LEN),
        subnetAuth: authInput.decode(r),
      };
    case PCHAIN_TYPE_IDS.AddDelegatorTx:
      return {
        type: "AddDelegatorTx",
        baseTx: baseTxFields.decode(r),
        validator: validator.decode(r),
        stake: transferableOutputs.decode(r),
        rewardsOwner: outputOwners.decode(r),
      };
    case PCHAIN_TYPE_IDS.CreateChainTx:
      return {
        type: "CreateChainTx",
        baseTx: baseTxFields.decode(r),
        subnetId: r.fixed(ID_LEN),
        chainName: r.str(),
        vmId: r.fixed(ID_LEN),
        fxIds: ids32.decode(r),
        genesisData: r.varBytes(),
        subnetAuth: authInput.decode(r),
      };
    case PCHAIN_TYPE_IDS.CreateSubnetTx:
      return {
        type: "CreateSubnetTx",
        baseTx: baseTxFields.decode(r),
        owner: outputOwners.decode(r),
      };
    case PCHAIN_TYPE_IDS.ImportTx:
      return {
        type: "ImportTx",
        baseTx: baseTxFields.decode(r),
        sourceChain: r.fixed(ID_LEN),
        importedInputs: transferableInputs.decode(r),
      };
    case PCHAIN_TYPE_IDS.ExportTx:
      return {
        type: "ExportTx",
        baseTx: baseTxFields.decode(r),
        destinationChain: r.fixed(ID_LEN),
        exportedOutputs: transferableOutputs.decode(r),
      };
    case PCHAIN_TYPE_IDS.RemoveSubnetValidatorTx:
      return {
        type: "RemoveSubnetValidatorTx",
        baseTx: baseTxFields.decode(r),
        nodeId: r.fixed(NODE_ID_LEN),
        subnetId: r.fixed(ID_LEN),
        subnetAuth: authInput.decode(r),
      };
    case PCHAIN_TYPE_IDS.TransformSubnetTx:
      return {
        type: "TransformSubnetTx",
        baseTx: baseTxFields.decode(r),
        subnetId: r.fixed(ID_LEN),
        assetId: r.fixed(ID_LEN),
        initialSupply: r.u64(),
        maximumSupply: r.u64(),
        minConsumptionRate: r.u64(),
        maxConsumptionRate: r.u64(),
        minValidatorStake: r.u64(),
        maxValidatorStake: r.u64(),
        minStakeDuration: r.u32(),
        maxStakeDuration: r.u32(),
        minDelegationFee: r.u32(),
        minDelegatorStake: r.u64(),
        maxValidatorWeightFactor: r.u8(),
        uptimeRequirement: r.u32(),
        subnetAuth: authInput.decode(r),
      };
    case PCHAIN_TYPE_IDS.AddPermissionlessValidatorTx:
      return {
        type: "AddPermissionlessValidatorTx",
        baseTx: baseTxFields.decode(r),
        validator: validator.decode(r),
        subnetId: r.fixed(ID_LEN),
        signer: permissionlessSigner.decode(r),
        stake: transferableOutputs.decode(r),
        validatorRewardsOwner: outputOwners.decode(r),
        delegatorRewardsOwner: outputOwners.decode(r),
        delegationShares: r.u32(),
      };
    case PCHAIN_TYPE_IDS.AddPermissionlessDelegatorTx:
      return {
        type: "AddPermissionlessDelegatorTx",
        baseTx: baseTxFields.decode(r),
        validator: validator.decode(r),
        subnetId: r.fixed(ID_LEN),
        stake: transferableOutputs.decode(r),
        rewardsOwner: outputOwners.decode(r),
      };
    case PCHAIN_TYPE_IDS.TransferSubnetOwnershipTx:
      return {
        type: "TransferSubnetOwnershipTx",
        baseTx: baseTxFields.decode(r),
        subnetId: r.fixed(ID_LEN),
        subnetAuth: authInput.decode(r),
        owner: outputOwners.decode(r),
      };
    case PCHAIN_TYPE_IDS.BaseTx:
      return { type: "BaseTx", baseTx: baseTxFields.decode(r) };
    case PCHAIN_TYPE_IDS.ConvertSubnetToL1Tx:
      return {
        type: "ConvertSubnetToL1Tx",
        baseTx: baseTxFields.decode(r),
        subnetId: r.fixed(ID_LEN),
        chainId: r.fixed(ID_LEN),
        address: r.varBytes(),
        validators: r.array(l1Validator.decode, MIN_L1_VALIDATOR_LEN),
        subnetAuth: authInput.decode(r),
      };
    case PCHAIN_TYPE_IDS.RegisterL1ValidatorTx:
      return {
        type: "RegisterL1ValidatorTx",
        baseTx: baseTxFields.decode(r),
        balance: r.u64(),
        proofOfPossession: r.fixed(BLS_SIGNATURE_LEN),
        message: r.varBytes(),
      };
    case PCHAIN_TYPE_IDS.SetL1ValidatorWeightTx:
      return {
        type: "SetL1ValidatorWeightTx",
        baseTx: baseTxFields.decode(r),
        message: r.varBytes(),
      };
    case PCHAIN_TYPE_IDS.IncreaseL1ValidatorBalanceTx:
      return {
        type: "IncreaseL1ValidatorBalanceTx",
        baseTx: baseTxFields.decode(r),
        validationId: r.fixed(ID_LEN),
        balance: r.u64(),
      };
    case PCHAIN_TYPE_IDS.DisableL1ValidatorTx:
      return {
        type: "DisableL1ValidatorTx",
        baseTx: baseTxFields.decode(r),
        validationId: r.fixed(ID_LEN),
        disableAuth: authInput.decode(r),
      };
    default:
      throw new TransactionCodecError(
        "UNKNOWN_TYPE_ID",
        `unknown P-chain transaction type ID ${typeId}`,
      );
  }
}

/** Codec version, type ID, then the variant's fields. */
export const pchainUnsignedTx: Codec<PChainUnsignedTx> = {
  encode: (w, tx) => {
    writeCodecVersion(w);
    w.u32(PCHAIN_TYPE_IDS[tx.type]);
    encodeBody(w, tx);
  },
  decode: (r) => {
    readCodecVersion(r);
    return decodeBody(r, r.u32());
  },
};

export function encodePChainUnsignedTx(tx: PChainUnsignedTx): Uint8Array {
  return encodeWith(pchainUnsignedTx, tx);
}

export function decodePChainUnsignedTx(bytes: Uint8Array): PChainUnsignedTx {
  return decodeWith(pchainUnsignedTx, bytes);
}
