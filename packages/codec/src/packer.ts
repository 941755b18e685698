/**
 * Binary packer.
 *
 * Fixed-layout big-endian serialization shared by all three chain formats:
 * - integers: u8, u16, u32, u64 (bigint)
 * - fixed-width byte strings (IDs, signatures, keys)
 * - u32-length-prefixed byte strings
 * - u16-length-prefixed UTF-8 strings
 * - u32-count-prefixed arrays
 *
 * Decoding is strict. Reads past the end fail, array counts are checked
 * against the remaining bytes before anything is allocated, and a full
 * decode fails on leftover bytes.
 */

import { TransactionCodecError } from "./errors.js";

const MAX_U8 = 0xff;
const MAX_U16 = 0xffff;
const MAX_U32 = 0xffff_ffff;
const MAX_U64 = 0xffff_ffff_ffff_ffffn;

/**
 * Encoder/decoder pair for one value shape.
 */
export interface Codec<T> {
  encode(w: Writer, value: T): void;
  decode(r: Reader): T;
}

// =============================================================================
// Writer
// =============================================================================

export class Writer {
  private readonly chunks: Uint8Array[] = [];
  private size = 0;

  u8(value: number): this {
    checkUint(value, MAX_U8, "u8");
    return this.push(Uint8Array.of(value));
  }

  u16(value: number): this {
    checkUint(value, MAX_U16, "u16");
    const buf = new Uint8Array(2);
    new DataView(buf.buffer).setUint16(0, value);
    return this.push(buf);
  }

  u32(value: number): this {
    checkUint(value, MAX_U32, "u32");
    const buf = new Uint8Array(4);
    new DataView(buf.buffer).setUint32(0, value);
    return this.push(buf);
  }

  u64(value: bigint): this {
    if (value < 0n || value > MAX_U64) {
      throw new TransactionCodecError("OUT_OF_RANGE", `u64 out of range: ${value}`);
    }
    const buf = new Uint8Array(8);
    new DataView(buf.buffer).setBigUint64(0, value);
    return this.push(buf);
  }

  /** Write exactly `length` bytes; the value must already have that width. */
  fixed(bytes: Uint8Array, length: number): this {
    if (bytes.length !== length) {
      throw new TransactionCodecError(
        "INVALID_LENGTH",
        `expected ${length} bytes, got ${bytes.length}`,
      );
    }
    return this.push(bytes.slice());
  }

  varBytes(bytes: Uint8Array): this {
    this.u32(bytes.length);
    return this.push(bytes.slice());
  }

  str(value: string): this {
    const bytes = new TextEncoder().encode(value);
    this.u16(bytes.length);
    return this.push(bytes);
  }

  array<T>(items: readonly T[], encodeItem: (w: Writer, item: T) => void): this {
    this.u32(items.length);
    for (const item of items) {
      encodeItem(this, item);
    }
    return this;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  private push(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.size += bytes.length;
    return this;
  }
}

function checkUint(value: number, max: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new TransactionCodecError("OUT_OF_RANGE", `${label} out of range: ${value}`);
  }
}

// =============================================================================
// Reader
// =============================================================================

export class Reader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  remaining(): number {
    return this.bytes.length - this.offset;
  }

  u8(): number {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(): number {
    this.require(2);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  u32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  u64(): bigint {
    this.require(8);
    const value = this.view.getBigUint64(this.offset);
    this.offset += 8;
    return value;
  }

  fixed(length: number): Uint8Array {
    this.require(length);
    const value = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  varBytes(): Uint8Array {
    return this.fixed(this.u32());
  }

  str(): string {
    const bytes = this.fixed(this.u16());
    try {
      return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch {
      throw new TransactionCodecError("INVALID_ENCODING", "string is not valid UTF-8");
    }
  }

  /**
   * Read a count-prefixed array. `minItemSize` is the smallest encoded size
   * of one item; the count is rejected up front when the remaining bytes
   * cannot hold that many items.
   */
  array<T>(decodeItem: (r: Reader) => T, minItemSize: number): T[] {
    const count = this.u32();
    if (count * minItemSize > this.remaining()) {
      throw new TransactionCodecError(
        "TRUNCATED",
        `array of ${count} items cannot fit in ${this.remaining()} remaining bytes`,
      );
    }
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(decodeItem(this));
    }
    return items;
  }

  /** Fail unless every byte has been consumed. */
  expectEnd(): void {
    if (this.remaining() !== 0) {
      throw new TransactionCodecError(
        "TRAILING_BYTES",
        `${this.remaining()} unread bytes after decode`,
      );
    }
  }

  private require(length: number): void {
    if (this.remaining() < length) {
      throw new TransactionCodecError(
        "TRUNCATED",
        `need ${length} bytes at offset ${this.offset}, have ${this.remaining()}`,
      );
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function encodeWith<T>(codec: Codec<T>, value: T): Uint8Array {
  const w = new Writer();
  codec.encode(w, value);
  return w.toBytes();
}

/** Decode a complete byte string; leftover bytes are an error. */
export function decodeWith<T>(codec: Codec<T>, bytes: Uint8Array): T {
  const r = new Reader(bytes);
  const value = codec.decode(r);
  r.expectEnd();
  return value;
}

/** Read a u32 type ID and fail unless it is the expected one. */
export function expectTypeId(r: Reader, expected: number, what: string): void {
  const typeId = r.u32();
  if (typeId !== expected) {
    throw new TransactionCodecError(
      "UNKNOWN_TYPE_ID",
      `expected ${what} type ID ${expected}, got ${typeId}`,
    );
  }
}
