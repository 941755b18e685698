import { describe, it, expect } from "vitest";
import {
  EMPTY_SIGNATURE,
  PCHAIN_TYPE_IDS,
  SUBNET_AUTH_KINDS,
  TransactionCodecError,
  bytesEqual,
  computeTxId,
  decodePChainUnsignedTx,
  decodeSignedPChainTx,
  encodePChainUnsignedTx,
  encodeSignedPChainTx,
  getPChainNetworkId,
  getSubnetAuth,
  getSubnetId,
  isSubnetAuthTx,
  signedPChainTxId,
  unsignedBytesOf,
} from "../src/index.js";
import type { PChainTxType, PChainUnsignedTx } from "../src/index.js";
import { codecErrorCode } from "./helpers/errors.js";
import { filled, id32, pchainFixtures, subnetAuth } from "./helpers/fixtures.js";

const fixtures = pchainFixtures(5, subnetAuth(0, 2));
const all: PChainUnsignedTx[] = Object.values(fixtures);
const cases = all.map((tx): [PChainTxType, PChainUnsignedTx] => [tx.type, tx]);

function typeIdOf(bytes: Uint8Array): number {
  return new DataView(bytes.buffer, bytes.byteOffset).getUint32(2);
}

describe("P-chain unsigned codec", () => {
  it("covers every transaction kind", () => {
    expect(all.map((tx) => tx.type).sort()).toEqual(Object.keys(PCHAIN_TYPE_IDS).sort());
  });

  it.each(cases)("round-trips %s", (_type, tx) => {
    const bytes = encodePChainUnsignedTx(tx);
    expect(decodePChainUnsignedTx(bytes)).toEqual(tx);
  });

  it.each(cases)("frames %s with version 0 and its type ID", (type, tx) => {
    const bytes = encodePChainUnsignedTx(tx);
    expect(bytes[0]).toBe(0);
    expect(bytes[1]).toBe(0);
    expect(typeIdOf(bytes)).toBe(PCHAIN_TYPE_IDS[type]);
  });

  it("encodes an empty proof-of-possession signer", () => {
    const tx: PChainUnsignedTx = { ...fixtures.AddPermissionlessValidatorTx, signer: { kind: "empty" } };
    expect(decodePChainUnsignedTx(encodePChainUnsignedTx(tx))).toEqual(tx);
  });

  it("rejects an unsupported codec version", () => {
    const bytes = encodePChainUnsignedTx(fixtures.BaseTx);
    bytes[1] = 1;
    expect(codecErrorCode(() => decodePChainUnsignedTx(bytes))).toBe("UNSUPPORTED_CODEC_VERSION");
  });

  it("rejects an unknown type ID", () => {
    const bytes = encodePChainUnsignedTx(fixtures.BaseTx);
    bytes[5] = 19;
    expect(codecErrorCode(() => decodePChainUnsignedTx(bytes))).toBe("UNKNOWN_TYPE_ID");
  });

  it("rejects truncated bytes", () => {
    const bytes = encodePChainUnsignedTx(fixtures.CreateChainTx);
    expect(() => decodePChainUnsignedTx(bytes.slice(0, -1))).toThrow(TransactionCodecError);
  });
});

describe("subnet authorization", () => {
  it("lists exactly the subnet-changing kinds", () => {
    const withAuth = all.filter(isSubnetAuthTx).map((tx) => tx.type);
    expect(withAuth.sort()).toEqual([...SUBNET_AUTH_KINDS].sort());
  });

  it("returns the auth indices in order", () => {
    expect(getSubnetAuth(fixtures.CreateChainTx)).toEqual({ sigIndices: [0, 2] });
    expect(getSubnetAuth(fixtures.ConvertSubnetToL1Tx)).toEqual({ sigIndices: [0, 2] });
  });

  it("reports no auth for funding-only kinds", () => {
    const none: PChainTxType[] = ["BaseTx", "CreateSubnetTx", "ImportTx", "DisableL1ValidatorTx"];
    for (const type of none) {
      expect(getSubnetAuth(fixtures[type])).toBeUndefined();
    }
  });

  it("returns the subnet ID where one is named", () => {
    expect(getSubnetId(fixtures.RemoveSubnetValidatorTx)).toEqual(id32(0x66));
    expect(getSubnetId(fixtures.AddPermissionlessDelegatorTx)).toEqual(id32(0x66));
    expect(getSubnetId(fixtures.CreateSubnetTx)).toBeUndefined();
  });

  it("reads the network ID from every kind", () => {
    for (const tx of all) {
      expect(getPChainNetworkId(tx)).toBe(5);
    }
  });
});

describe("signed P-chain transactions", () => {
  const signed = {
    unsigned: fixtures.CreateChainTx,
    credentials: [
      { signatures: [filled(65, 0x01)] },
      { signatures: [EMPTY_SIGNATURE, filled(65, 0x02)] },
    ],
  };

  it("appends the credentials to the unsigned bytes", () => {
    const unsignedBytes = unsignedBytesOf(signed);
    const bytes = encodeSignedPChainTx(signed);
    expect(bytesEqual(bytes.slice(0, unsignedBytes.length), unsignedBytes)).toBe(true);
    // count + 2 x (type ID + count) + 3 signatures
    expect(bytes.length - unsignedBytes.length).toBe(4 + 2 * 8 + 3 * 65);
  });

  it("round-trips partial signatures slot for slot", () => {
    const decoded = decodeSignedPChainTx(encodeSignedPChainTx(signed));
    expect(decoded.unsigned).toEqual(signed.unsigned);
    expect(decoded.credentials).toEqual(signed.credentials);
    expect(bytesEqual(decoded.unsignedBytes, unsignedBytesOf(signed))).toBe(true);
  });

  it("derives the ID from the signed bytes", () => {
    expect(signedPChainTxId(signed)).toBe(computeTxId(encodeSignedPChainTx(signed)));
    const other = { ...signed, credentials: [{ signatures: [filled(65, 0x01)] }] };
    expect(signedPChainTxId(other)).not.toBe(signedPChainTxId(signed));
  });

  it("rejects signatures of the wrong width", () => {
    const bad = { ...signed, credentials: [{ signatures: [new Uint8Array(64)] }] };
    expect(codecErrorCode(() => encodeSignedPChainTx(bad))).toBe("INVALID_LENGTH");
  });

  it("rejects a non-credential where a credential belongs", () => {
    const bytes = encodeSignedPChainTx(signed);
    const offset = unsignedBytesOf(signed).length + 4 + 3;
    bytes[offset] = 10;
    expect(codecErrorCode(() => decodeSignedPChainTx(bytes))).toBe("UNKNOWN_TYPE_ID");
  });
});
