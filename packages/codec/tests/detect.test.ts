import { describe, it, expect, vi } from "vitest";
import {
  CCHAIN_CODEC,
  DEFAULT_CHAIN_CODECS,
  PCHAIN_CODEC,
  XCHAIN_CODEC,
  decodeCChainUnsignedTx,
  decodeTx,
  decodeXChainUnsignedTx,
  detectChain,
  encodeCChainUnsignedTx,
  encodePChainUnsignedTx,
  encodeXChainUnsignedTx,
  extractNetworkId,
} from "../src/index.js";
import type { ChainCodec } from "../src/index.js";
import { cchainFixtures, id32, pchainFixtures, xchainFixtures } from "./helpers/fixtures.js";

const NETWORK_IDS = [1, 5, 12345];

function encodedFixtures(networkId: number): { chain: "P" | "X" | "C"; type: string; bytes: Uint8Array }[] {
  return [
    ...Object.values(pchainFixtures(networkId)).map((tx) => ({
      chain: "P" as const,
      type: tx.type,
      bytes: encodePChainUnsignedTx(tx),
    })),
    ...Object.values(xchainFixtures(networkId)).map((tx) => ({
      chain: "X" as const,
      type: tx.type,
      bytes: encodeXChainUnsignedTx(tx),
    })),
    ...Object.values(cchainFixtures(networkId)).map((tx) => ({
      chain: "C" as const,
      type: tx.type,
      bytes: encodeCChainUnsignedTx(tx),
    })),
  ];
}

/**
 * An X-chain base transaction with no funds and a 28-byte zero memo is
 * also a valid C-chain import with no inputs or outputs.
 */
function collidingBytes(): Uint8Array {
  return encodeXChainUnsignedTx({
    type: "BaseTx",
    baseTx: {
      networkId: 5,
      blockchainId: id32(0x00),
      outputs: [],
      inputs: [],
      memo: new Uint8Array(28),
    },
  });
}

describe("detectChain", () => {
  it("has a codec for every chain", () => {
    expect(DEFAULT_CHAIN_CODECS.map((c) => c.tag).sort()).toEqual(["C", "P", "X"]);
  });

  it.each(encodedFixtures(5).map((f): [string, string, Uint8Array] => [f.chain, f.type, f.bytes]))(
    "classifies %s-chain %s",
    (chain, _type, bytes) => {
      expect(detectChain(bytes)).toBe(chain);
    },
  );

  it("returns undefined for empty input", () => {
    expect(detectChain(new Uint8Array(0))).toBe("undefined");
  });

  it("returns undefined for garbage", () => {
    expect(detectChain(Uint8Array.of(0xde, 0xad, 0xbe, 0xef))).toBe("undefined");
    expect(detectChain(new Uint8Array(200).fill(0xff))).toBe("undefined");
  });

  it("returns undefined for truncated transactions", () => {
    const bytes = encodePChainUnsignedTx(pchainFixtures(5).CreateChainTx);
    expect(detectChain(bytes.slice(0, bytes.length - 3))).toBe("undefined");
  });

  it("returns undefined when two chain formats accept the same bytes", () => {
    const bytes = collidingBytes();
    expect(decodeXChainUnsignedTx(bytes).type).toBe("BaseTx");
    expect(decodeCChainUnsignedTx(bytes).type).toBe("ImportTx");
    expect(detectChain(bytes)).toBe("undefined");
    expect(extractNetworkId(bytes)).toBe(0);
  });

  it("returns undefined for a synthetic collision between injected codecs", () => {
    const bytes = encodePChainUnsignedTx(pchainFixtures(5).BaseTx);
    const shadow: ChainCodec = { tag: "X", decodeUnsigned: PCHAIN_CODEC.decodeUnsigned };
    expect(detectChain(bytes, [PCHAIN_CODEC, shadow])).toBe("undefined");
    expect(detectChain(bytes, [PCHAIN_CODEC, XCHAIN_CODEC])).toBe("P");
  });

  it("tries every codec even after a success", () => {
    const bytes = encodePChainUnsignedTx(pchainFixtures(5).BaseTx);
    const first = { tag: "P" as const, decodeUnsigned: vi.fn(PCHAIN_CODEC.decodeUnsigned) };
    const second = { tag: "C" as const, decodeUnsigned: vi.fn(CCHAIN_CODEC.decodeUnsigned) };
    expect(detectChain(bytes, [first, second])).toBe("P");
    expect(first.decodeUnsigned).toHaveBeenCalledTimes(1);
    expect(second.decodeUnsigned).toHaveBeenCalledTimes(1);
  });

  it("does not depend on codec order", () => {
    const bytes = encodeCChainUnsignedTx(cchainFixtures(5).ExportTx);
    const reversed = [...DEFAULT_CHAIN_CODECS].reverse();
    expect(detectChain(bytes, reversed)).toBe(detectChain(bytes));
  });
});

describe("extractNetworkId", () => {
  for (const networkId of NETWORK_IDS) {
    it(`returns ${networkId} for every variant of every chain`, () => {
      const fixtures = encodedFixtures(networkId);
      expect(fixtures).toHaveLength(18 + 5 + 2);
      for (const { bytes } of fixtures) {
        expect(extractNetworkId(bytes)).toBe(networkId);
      }
    });
  }

  it("returns 0 for unclassifiable input", () => {
    expect(extractNetworkId(new Uint8Array(0))).toBe(0);
    expect(extractNetworkId(Uint8Array.of(1, 2, 3))).toBe(0);
  });
});

describe("decodeTx", () => {
  it("returns the decoded transaction with its chain", () => {
    const tx = xchainFixtures(5).ExportTx;
    expect(decodeTx(encodeXChainUnsignedTx(tx))).toEqual({ chain: "X", tx });
  });

  it("returns undefined on collision", () => {
    expect(decodeTx(collidingBytes())).toBeUndefined();
  });
});
