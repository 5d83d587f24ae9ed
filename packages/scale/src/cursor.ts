import { u8aToBigInt, u8aToNumber, u8aToString } from "@polkadot/util";
import { DecodeError, expect } from "./errors.js";

/**
 * Forward-only reader over a byte buffer. Offsets are absolute positions in
 * the buffer handed to the constructor, so callers can slice ranges out of it
 * after walking a value.
 */
export class Cursor {
  private o: number;

  constructor(
    readonly u8a: Uint8Array,
    offset = 0,
  ) {
    this.o = offset;
  }

  get offset(): number {
    return this.o;
  }

  get remaining(): number {
    return this.u8a.length - this.o;
  }

  eof(): boolean {
    return this.o >= this.u8a.length;
  }

  u8(): number {
    const b = this.u8a[this.o];
    if (b === undefined) throw new DecodeError("read u8 out of range", this.o);
    this.o += 1;
    return b;
  }

  bytes(n: number): Uint8Array {
    expect(
      n >= 0 && this.o + n <= this.u8a.length,
      `read ${n} bytes out of range`,
      this.o,
    );
    const out = this.u8a.subarray(this.o, this.o + n);
    this.o += n;
    return out;
  }

  skip(n: number): void {
    this.bytes(n);
  }

  /** Little-endian unsigned or signed integer; widths up to 4 bytes come back as numbers. */
  int(byteLength: number, signed = false): number | bigint {
    const raw = this.bytes(byteLength);
    if (byteLength <= 4) return u8aToNumber(raw, { isLe: true, isNegative: signed });
    return u8aToBigInt(raw, { isLe: true, isNegative: signed });
  }

  /** SCALE compact integer, all four modes. */
  compact(): bigint {
    const start = this.o;
    const b0 = this.u8();
    const mode = b0 & 0b11;
    if (mode === 0) return BigInt(b0 >> 2);
    if (mode === 1) {
      const b1 = this.u8();
      return BigInt(((b0 >> 2) | (b1 << 6)) >>> 0);
    }
    if (mode === 2) {
      const rest = this.bytes(3);
      const v =
        ((b0 >> 2) | (rest[0]! << 6) | (rest[1]! << 14) | (rest[2]! << 22)) >>> 0;
      return BigInt(v);
    }
    // big-integer mode: upper six bits hold (byte length - 4)
    const len = (b0 >> 2) + 4;
    expect(len <= 67, `compact: invalid length ${len}`, start);
    return u8aToBigInt(this.bytes(len), { isLe: true, isNegative: false });
  }

  /** Compact that must fit a JS number (lengths, counts). */
  compactNumber(): number {
    const start = this.o;
    const v = this.compact();
    expect(v <= BigInt(Number.MAX_SAFE_INTEGER), "compact: value too large", start);
    return Number(v);
  }

  /** Compact-length-prefixed UTF-8 string. */
  text(): string {
    return u8aToString(this.bytes(this.compactNumber()));
  }
}
