import { Metadata } from "@ledgerkit/metadata";
import {
  DecodeError,
  RegistryBuilder,
  asPrimitive,
  concatU8a,
  encodeCompact,
  field,
} from "@ledgerkit/scale";
import { staticExtrinsic } from "../src/index.js";

/**
 * Pallet `Test` (index 0) with calls `Ping` (0) and `TestCall` (2), pallet
 * `Balances` (index 5) with `transfer` (0). Signed extrinsics carry a 4-byte
 * address, an 8-byte signature and the extensions CheckNonce, CheckWeight and
 * ChargeTransactionPayment.
 */
export function testMetadata(): Metadata {
  const b = new RegistryBuilder();
  const unit = b.unit();
  const u8 = b.primitive("u8");
  const bool = b.primitive("bool");
  const str = b.primitive("str");
  const compactU32 = b.add({ kind: "Compact", typeParam: b.primitive("u32") });
  const compactU128 = b.add({ kind: "Compact", typeParam: b.primitive("u128") });
  const u128 = b.primitive("u128");

  const testCall = b.add({
    kind: "Variant",
    variants: [
      { name: "Ping", index: 0, fields: [] },
      {
        name: "TestCall",
        index: 2,
        fields: [
          { name: "value", ty: u128 },
          { name: "signed", ty: bool },
          { name: "name", ty: str },
        ],
      },
    ],
  });
  const balancesCall = b.add({
    kind: "Variant",
    variants: [{ name: "transfer", index: 0, fields: [{ name: "amount", ty: compactU128 }] }],
  });
  const runtimeCall = b.add({
    kind: "Variant",
    variants: [
      { name: "Test", index: 0, fields: [{ ty: testCall }] },
      { name: "Balances", index: 5, fields: [{ ty: balancesCall }] },
    ],
  });
  const noVariants = b.add({ kind: "Variant", variants: [] });

  const address = b.add({ kind: "Array", len: 4, typeParam: u8 });
  const signature = b.add({ kind: "Array", len: 8, typeParam: u8 });
  const extra = b.add({ kind: "Tuple", fields: [compactU32, unit, compactU128] });

  return new Metadata({
    types: b.build(),
    pallets: [
      { name: "Test", index: 0, callTy: testCall, constants: [] },
      { name: "Balances", index: 5, callTy: balancesCall, constants: [] },
    ],
    extrinsic: {
      version: 4,
      addressTy: address,
      callTy: runtimeCall,
      signatureTy: signature,
      extraTy: extra,
      signedExtensions: [
        { identifier: "CheckNonce", extraTy: compactU32, additionalTy: unit },
        { identifier: "CheckWeight", extraTy: unit, additionalTy: unit },
        { identifier: "ChargeTransactionPayment", extraTy: compactU128, additionalTy: unit },
      ],
    },
    runtimeTy: unit,
    apis: [],
    outerEnums: { callEnumTy: runtimeCall, eventEnumTy: noVariants, errorEnumTy: noVariants },
  });
}

/** Little-endian u128. */
function u128(value: number): number[] {
  const out = new Array<number>(16).fill(0);
  out[0] = value & 0xff;
  out[1] = (value >> 8) & 0xff;
  return out;
}

function str(s: string): number[] {
  return [...encodeCompact(s.length), ...Array.from(s, (c) => c.charCodeAt(0))];
}

/** Unsigned `Test.TestCall { value, signed: true, name }`, without length prefix. */
export function testCallBytes(value: number, name = "SomeValue"): Uint8Array {
  return Uint8Array.from([0x04, 0, 2, ...u128(value), 1, ...str(name)]);
}

/** Unsigned `Test.Ping`. */
export const PING = Uint8Array.of(0x04, 0, 0);

/** Unsigned `Balances.transfer { amount: 1 }`. */
export const TRANSFER = Uint8Array.of(0x04, 5, 0, 0x04);

/** Signed `Test.Ping` with nonce 5 and tip 64. */
export const SIGNED_PING = Uint8Array.of(
  0x84,
  ...[1, 2, 3, 4],
  ...new Array<number>(8).fill(9),
  0x14,
  0x01,
  0x01,
  0,
  0,
);

/** An extrinsic as it sits in a block body. */
export function prefixed(bytes: Uint8Array): Uint8Array {
  return concatU8a(encodeCompact(bytes.length), bytes);
}

/** Declares three bytes, carries one. */
export const TRUNCATED = Uint8Array.of(0x0c, 0x04);

export interface TestCall {
  value: bigint;
  signed: boolean;
  name: string;
}

export const TestCall = staticExtrinsic("Test", "TestCall", (fields): TestCall => {
  const value = asPrimitive(field(fields, "value"));
  const signed = asPrimitive(field(fields, "signed"));
  const name = asPrimitive(field(fields, "name"));
  if (typeof value !== "bigint" || typeof signed !== "boolean" || typeof name !== "string") {
    throw new DecodeError("fields do not match Test.TestCall");
  }
  return { value, signed, name };
});

export const Ping = staticExtrinsic("Test", "Ping", () => null);

export const Burn = staticExtrinsic("Balances", "burn", () => null);

export const Transfer = staticExtrinsic("Balances", "transfer", (fields) =>
  asPrimitive(field(fields, "amount")),
);
