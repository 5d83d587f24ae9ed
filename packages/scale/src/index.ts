// packages/scale/src/index.ts
import { blake2b } from "@noble/hashes/blake2b";
import {
  compactToU8a,
  hexToU8a as polkadotHexToU8a,
  isHex,
  u8aConcat,
  u8aToHex as polkadotU8aToHex,
} from "@polkadot/util";
import { Cursor } from "./cursor.js";
import { DecodeError } from "./errors.js";

export type HexString = `0x${string}`;

export { Cursor } from "./cursor.js";
export { DecodeError, IntegrityError } from "./errors.js";
export { frozenCopy } from "./freeze.js";
export {
  PRIMITIVES,
  PortableRegistry,
  RegistryBuilder,
  primitiveTag,
} from "./registry.js";
export type {
  Field,
  Primitive,
  RegistryType,
  TypeDef,
  Variant,
} from "./registry.js";
export { Value, asPrimitive, field, values } from "./value.js";
export type { Composite, PrimitiveValue } from "./value.js";
export { decodeAll, decodeFields, decodeValue, skipType } from "./decode.js";
export type { FieldsDecoder, TypeDecoder } from "./decode.js";

// ---------- Hex utils ----------
export function hexToU8a(hex: string): Uint8Array {
  const h = hex.startsWith("0x") ? hex : `0x${hex}`;
  if (!isHex(h)) throw new DecodeError(`invalid hex string: ${hex.slice(0, 18)}`);
  return polkadotHexToU8a(h);
}

export function u8aToHex(u8: Uint8Array): HexString {
  return polkadotU8aToHex(u8);
}

/** Bytes as-is, hex decoded. */
export function toU8a(input: Uint8Array | string): Uint8Array {
  return typeof input === "string" ? hexToU8a(input) : input;
}

// ---------- SCALE primitives ----------
export function concatU8a(...parts: Uint8Array[]): Uint8Array {
  return u8aConcat(...parts);
}

export function encodeCompact(value: number | bigint): Uint8Array {
  if (value < 0) throw new RangeError("compact: negative");
  return compactToU8a(value);
}

/**
 * Split a compact length prefix off `bytes`. The declared length must match
 * what follows; extrinsics inside a block body arrive this way.
 */
export function stripCompactPrefix(bytes: Uint8Array): { length: number; rest: Uint8Array } {
  const cursor = new Cursor(bytes);
  const length = cursor.compactNumber();
  if (cursor.remaining < length)
    throw new DecodeError(
      `length prefix declares ${length} bytes but ${cursor.remaining} follow`,
      cursor.offset,
    );
  return { length, rest: bytes.subarray(cursor.offset, cursor.offset + length) };
}

/** BlakeTwo256 = Blake2b-256 */
export function blakeTwo256(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 32 });
}
