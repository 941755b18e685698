/**
 * Transaction fixtures, one per variant of every chain.
 *
 * Funding outputs use an asset ID of 0x11 bytes and C-chain source and
 * destination chains use 0x22/0x33 bytes, so that each fixture's bytes are
 * accepted by its own chain's codec only.
 */

import type {
  BaseTxFields,
  CChainTxType,
  CChainUnsignedTx,
  Input,
  OutputOwners,
  PChainTxType,
  PChainUnsignedTx,
  TransferableInput,
  TransferableOutput,
  Validator,
  XChainTxType,
  XChainUnsignedTx,
} from "../../src/index.js";

export type PChainFixtures = { [K in PChainTxType]: Extract<PChainUnsignedTx, { type: K }> };
export type XChainFixtures = { [K in XChainTxType]: Extract<XChainUnsignedTx, { type: K }> };
export type CChainFixtures = { [K in CChainTxType]: Extract<CChainUnsignedTx, { type: K }> };

export function filled(length: number, byte: number): Uint8Array {
  return new Uint8Array(length).fill(byte);
}

export const id32 = (byte: number): Uint8Array => filled(32, byte);
export const id20 = (byte: number): Uint8Array => filled(20, byte);

export const ASSET_ID = id32(0x11);

export function owners(...keys: number[]): OutputOwners {
  return { locktime: 0n, threshold: 1, addresses: keys.map(id20) };
}

export const changeOutput: TransferableOutput = {
  assetId: ASSET_ID,
  output: { amount: 1_000_000n, locktime: 0n, threshold: 1, addresses: [id20(0x01)] },
};

export const fundingInput: TransferableInput = {
  utxoId: { txId: id32(0x44), outputIndex: 0 },
  assetId: ASSET_ID,
  input: { amount: 2_000_000n, sigIndices: [0] },
};

export function baseFields(networkId: number): BaseTxFields {
  return {
    networkId,
    blockchainId: id32(0x00),
    outputs: [changeOutput],
    inputs: [fundingInput],
    memo: new Uint8Array(0),
  };
}

const validator: Validator = {
  nodeId: id20(0x55),
  startTime: 1_700_000_000n,
  endTime: 1_700_086_400n,
  weight: 20n,
};

export function subnetAuth(...sigIndices: number[]): Input {
  return { sigIndices };
}

export function pchainFixtures(networkId: number, auth: Input = subnetAuth(0)): PChainFixtures {
  const baseTx = baseFields(networkId);
  return {
    AddValidatorTx: {
      type: "AddValidatorTx",
      baseTx,
      validator,
      stake: [changeOutput],
      rewardsOwner: owners(0x02),
      delegationShares: 20_000,
    },
    AddSubnetValidatorTx: {
      type: "AddSubnetValidatorTx",
      baseTx,
      validator,
      subnetId: id32(0x66),
      subnetAuth: auth,
    },
    AddDelegatorTx: {
      type: "AddDelegatorTx",
      baseTx,
      validator,
      stake: [changeOutput],
      rewardsOwner: owners(0x02),
    },
    CreateChainTx: {
      type: "CreateChainTx",
      baseTx,
      subnetId: id32(0x66),
      chainName: "testchain",
      vmId: id32(0x77),
      fxIds: [id32(0x78)],
      genesisData: Uint8Array.of(0x7b, 0x7d),
      subnetAuth: auth,
    },
    CreateSubnetTx: {
      type: "CreateSubnetTx",
      baseTx,
      owner: owners(0x01, 0x02, 0x03),
    },
    ImportTx: {
      type: "ImportTx",
      baseTx,
      sourceChain: id32(0x88),
      importedInputs: [fundingInput],
    },
    ExportTx: {
      type: "ExportTx",
      baseTx,
      destinationChain: id32(0x88),
      exportedOutputs: [changeOutput],
    },
    RemoveSubnetValidatorTx: {
      type: "RemoveSubnetValidatorTx",
      baseTx,
      nodeId: id20(0x55),
      subnetId: id32(0x66),
      subnetAuth: auth,
    },
    TransformSubnetTx: {
      type: "TransformSubnetTx",
      baseTx,
      subnetId: id32(0x66),
      assetId: id32(0x99),
      initialSupply: 1_000n,
      maximumSupply: 10_000n,
      minConsumptionRate: 1n,
      maxConsumptionRate: 2n,
      minValidatorStake: 10n,
      maxValidatorStake: 100n,
      minStakeDuration: 60,
      maxStakeDuration: 3_600,
      minDelegationFee: 5,
      minDelegatorStake: 1n,
      maxValidatorWeightFactor: 5,
      uptimeRequirement: 800_000,
      subnetAuth: auth,
    },
    AddPermissionlessValidatorTx: {
      type: "AddPermissionlessValidatorTx",
      baseTx,
      validator,
      subnetId: id32(0x00),
      signer: { kind: "proofOfPossession", publicKey: filled(48, 0xa1), signature: filled(96, 0xa2) },
      stake: [changeOutput],
      validatorRewardsOwner: owners(0x02),
      delegatorRewardsOwner: owners(0x03),
      delegationShares: 20_000,
    },
    AddPermissionlessDelegatorTx: {
      type: "AddPermissionlessDelegatorTx",
      baseTx,
      validator,
      subnetId: id32(0x66),
      stake: [changeOutput],
      rewardsOwner: owners(0x02),
    },
    TransferSubnetOwnershipTx: {
      type: "TransferSubnetOwnershipTx",
      baseTx,
      subnetId: id32(0x66),
      subnetAuth: auth,
      owner: owners(0x04),
    },
    BaseTx: { type: "BaseTx", baseTx },
    ConvertSubnetToL1Tx: {
      type: "ConvertSubnetToL1Tx",
      baseTx,
      subnetId: id32(0x66),
      chainId: id32(0x67),
      address: Uint8Array.of(0xde, 0xad),
      validators: [
        {
          nodeId: id20(0x55),
          weight: 100n,
          balance: 5_000n,
          signer: { publicKey: filled(48, 0xb1), signature: filled(96, 0xb2) },
          remainingBalanceOwner: { threshold: 1, addresses: [id20(0x01)] },
          deactivationOwner: { threshold: 1, addresses: [id20(0x02)] },
        },
      ],
      subnetAuth: auth,
    },
    RegisterL1ValidatorTx: {
      type: "RegisterL1ValidatorTx",
      baseTx,
      balance: 5_000n,
      proofOfPossession: filled(96, 0xc1),
      message: Uint8Array.of(1, 2, 3),
    },
    SetL1ValidatorWeightTx: {
      type: "SetL1ValidatorWeightTx",
      baseTx,
      message: Uint8Array.of(4, 5, 6),
    },
    IncreaseL1ValidatorBalanceTx: {
      type: "IncreaseL1ValidatorBalanceTx",
      baseTx,
      validationId: id32(0xd1),
      balance: 1_000n,
    },
    DisableL1ValidatorTx: {
      type: "DisableL1ValidatorTx",
      baseTx,
      validationId: id32(0xd1),
      disableAuth: subnetAuth(0),
    },
  };
}

export function xchainFixtures(networkId: number): XChainFixtures {
  const baseTx = baseFields(networkId);
  return {
    BaseTx: { type: "BaseTx", baseTx },
    CreateAssetTx: {
      type: "CreateAssetTx",
      baseTx,
      name: "Test Token",
      symbol: "TST",
      denomination: 9,
      initialStates: [
        {
          fxIndex: 0,
          outputs: [
            { kind: "transfer", amount: 500n, locktime: 0n, threshold: 1, addresses: [id20(0x01)] },
            { kind: "mint", locktime: 0n, threshold: 1, addresses: [id20(0x02)] },
          ],
        },
      ],
    },
    OperationTx: {
      type: "OperationTx",
      baseTx,
      operations: [
        {
          assetId: id32(0x12),
          utxoIds: [{ txId: id32(0x45), outputIndex: 1 }],
          op: {
            mintInput: { sigIndices: [0] },
            mintOutput: owners(0x02),
            transferOutput: { amount: 50n, locktime: 0n, threshold: 1, addresses: [id20(0x03)] },
          },
        },
      ],
    },
    ImportTx: {
      type: "ImportTx",
      baseTx,
      sourceChain: id32(0x88),
      importedInputs: [fundingInput],
    },
    ExportTx: {
      type: "ExportTx",
      baseTx,
      destinationChain: id32(0x88),
      exportedOutputs: [changeOutput],
    },
  };
}

export function cchainFixtures(networkId: number): CChainFixtures {
  return {
    ImportTx: {
      type: "ImportTx",
      networkId,
      blockchainId: id32(0x00),
      sourceChain: id32(0x22),
      importedInputs: [fundingInput],
      outputs: [{ address: id20(0x0e), amount: 900_000n, assetId: ASSET_ID }],
    },
    ExportTx: {
      type: "ExportTx",
      networkId,
      blockchainId: id32(0x00),
      destinationChain: id32(0x33),
      inputs: [{ address: id20(0x0e), amount: 900_000n, assetId: ASSET_ID, nonce: 7n }],
      exportedOutputs: [changeOutput],
    },
  };
}
