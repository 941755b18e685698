import { describe, it, expect } from "vitest";
import {
  bytesEqual,
  cb58Decode,
  cb58Encode,
  compareBytes,
  computeTxId,
  formatAddress,
  fromHex,
  isAllZero,
  parseAddress,
  toHex,
} from "../src/encoding.js";
import { TransactionCodecError } from "../src/errors.js";

const SEQ_20 = Uint8Array.from({ length: 20 }, (_, i) => i);
const SEQ_32 = Uint8Array.from({ length: 32 }, (_, i) => i);

describe("hex", () => {
  it("encodes lowercase", () => {
    expect(toHex(Uint8Array.of(0xab, 0x01))).toBe("ab01");
  });

  it("accepts whitespace, 0x and uppercase", () => {
    expect(Array.from(fromHex("  0xAB01\n"))).toEqual([0xab, 0x01]);
  });

  it("rejects odd-length and non-hex text", () => {
    expect(() => fromHex("abc")).toThrow(TransactionCodecError);
    expect(() => fromHex("zz")).toThrow(TransactionCodecError);
  });
});

describe("cb58", () => {
  it("encodes the empty ID", () => {
    expect(cb58Encode(new Uint8Array(32))).toBe("11111111111111111111111111111111LpoYY");
  });

  it("encodes a 32-byte sequence", () => {
    expect(cb58Encode(SEQ_32)).toBe("16qJFWMMHFy3xDdLmvUeyc2S6FrWRhJP51HsvDYdz9cWcm5W");
  });

  it("decodes what it encodes", () => {
    expect(bytesEqual(cb58Decode(cb58Encode(SEQ_32)), SEQ_32)).toBe(true);
  });

  it("rejects a corrupted checksum", () => {
    const text = cb58Encode(SEQ_32);
    const corrupted = text.slice(0, -1) + (text.endsWith("W") ? "X" : "W");
    expect(() => cb58Decode(corrupted)).toThrow(/checksum/);
  });

  it("rejects non-base58 text", () => {
    expect(() => cb58Decode("0OIl")).toThrow(TransactionCodecError);
  });
});

describe("computeTxId", () => {
  it("is deterministic and content-derived", () => {
    const a = computeTxId(Uint8Array.of(1, 2, 3));
    expect(computeTxId(Uint8Array.of(1, 2, 3))).toBe(a);
    expect(computeTxId(Uint8Array.of(1, 2, 4))).not.toBe(a);
    expect(cb58Decode(a)).toHaveLength(32);
  });
});

describe("addresses", () => {
  it("formats with the chain alias and network HRP", () => {
    expect(formatAddress("P", "fuji", SEQ_20)).toBe("P-fuji1qqqsyqcyq5rqwzqfpg9scrgwpugpzysn6xcvym");
    expect(formatAddress("X", "avax", SEQ_20)).toBe("X-avax1qqqsyqcyq5rqwzqfpg9scrgwpugpzysnk5ungy");
  });

  it("parses a formatted address", () => {
    const parsed = parseAddress("P-fuji1qqqsyqcyq5rqwzqfpg9scrgwpugpzysn6xcvym");
    expect(parsed.chain).toBe("P");
    expect(parsed.hrp).toBe("fuji");
    expect(bytesEqual(parsed.shortId, SEQ_20)).toBe(true);
  });

  it("rejects a bad checksum", () => {
    expect(() => parseAddress("P-fuji1qqqsyqcyq5rqwzqfpg9scrgwpugpzysn6xcvyq")).toThrow(
      TransactionCodecError,
    );
  });

  it("rejects a checksummed payload with excess padding bits", () => {
    // 33 five-bit words of 31: valid checksum, 165 bits
    const padded = "P-fuji1lllllllllllllllllllllllllllllllll5t75za";
    expect(() => parseAddress(padded)).toThrow(TransactionCodecError);
    expect(() => parseAddress(padded)).toThrow(/invalid bech32 address/);
  });

  it("rejects unknown chain aliases and missing separators", () => {
    expect(() => parseAddress("Q-fuji1qqqsyqcyq5rqwzqfpg9scrgwpugpzysn6xcvym")).toThrow(
      /not a chain address/,
    );
    expect(() => parseAddress("fuji1qqqsyqcyq5rqwzqfpg9scrgwpugpzysn6xcvym")).toThrow(
      /not a chain address/,
    );
  });

  it("rejects short IDs of the wrong length", () => {
    expect(() => formatAddress("P", "fuji", new Uint8Array(19))).toThrow(TransactionCodecError);
  });
});

describe("byte helpers", () => {
  it("orders lexicographically", () => {
    expect(compareBytes(Uint8Array.of(1, 2), Uint8Array.of(1, 3))).toBeLessThan(0);
    expect(compareBytes(Uint8Array.of(2), Uint8Array.of(1, 9))).toBeGreaterThan(0);
    expect(compareBytes(Uint8Array.of(1), Uint8Array.of(1, 0))).toBeLessThan(0);
    expect(compareBytes(Uint8Array.of(4, 4), Uint8Array.of(4, 4))).toBe(0);
  });

  it("detects all-zero buffers", () => {
    expect(isAllZero(new Uint8Array(65))).toBe(true);
    expect(isAllZero(Uint8Array.of(0, 1))).toBe(false);
  });
});
