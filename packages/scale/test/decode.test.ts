import { describe, expect, it } from "vitest";
import {
  Cursor,
  DecodeError,
  IntegrityError,
  RegistryBuilder,
  Value,
  decodeAll,
  decodeValue,
  skipType,
  type PortableRegistry,
} from "../src/index.js";

const p = (v: boolean | string | number | bigint): Value => Value.primitive(v);

function walk(registry: PortableRegistry, id: number, bytes: number[]) {
  const skipped = new Cursor(Uint8Array.from(bytes));
  skipType(skipped, id, registry);
  const decoded = new Cursor(Uint8Array.from(bytes));
  const value = decodeValue(decoded, id, registry);
  return { value, skippedTo: skipped.offset, decodedTo: decoded.offset };
}

describe("skipType / decodeValue", () => {
  const b = new RegistryBuilder();
  const u8 = b.primitive("u8");
  const u16 = b.primitive("u16");
  const u32 = b.primitive("u32");
  const u128 = b.primitive("u128");
  const bool = b.primitive("bool");
  const str = b.primitive("str");
  const point = b.add({
    kind: "Composite",
    fields: [
      { name: "a", ty: u8 },
      { name: "b", ty: u16 },
    ],
  });
  const choice = b.add({
    kind: "Variant",
    variants: [
      { name: "Bar", index: 0, fields: [] },
      { name: "Foo", index: 5, fields: [{ ty: u8 }] },
    ],
  });
  const seqU16 = b.add({ kind: "Sequence", typeParam: u16 });
  const seqPoint = b.add({ kind: "Sequence", typeParam: point });
  const arr3 = b.add({ kind: "Array", len: 3, typeParam: u8 });
  const pair = b.add({ kind: "Tuple", fields: [bool, str] });
  const compactU32 = b.add({ kind: "Compact", typeParam: u32 });
  const compactU128 = b.add({ kind: "Compact", typeParam: u128 });
  const wrapped = b.add({ kind: "Composite", fields: [{ name: "inner", ty: u32 }] });
  const compactWrapped = b.add({ kind: "Compact", typeParam: wrapped });
  const lsb0 = b.add({ kind: "Composite", fields: [] }, ["bitvec", "order", "Lsb0"]);
  const msb0 = b.add({ kind: "Composite", fields: [] }, ["bitvec", "order", "Msb0"]);
  const bitsLsb = b.add({ kind: "BitSequence", bitOrderType: lsb0, bitStoreType: u8 });
  const bitsMsb = b.add({ kind: "BitSequence", bitOrderType: msb0, bitStoreType: u8 });
  const bitsBadStore = b.add({ kind: "BitSequence", bitOrderType: lsb0, bitStoreType: bool });
  const registry = b.build();

  it("walks a composite field by field", () => {
    const r = walk(registry, point, [1, 0x02, 0x01, 0xff]);
    expect(r.value).toEqual(Value.named([["a", p(1)], ["b", p(258)]]));
    expect(r.skippedTo).toBe(3);
    expect(r.decodedTo).toBe(3);
  });

  it("matches variants by wire index, not position", () => {
    const r = walk(registry, choice, [5, 9]);
    expect(r.value).toEqual(Value.variant("Foo", { kind: "unnamed", values: [p(9)] }));
    expect(r.skippedTo).toBe(2);
  });

  it("rejects an unknown variant index", () => {
    expect(() => skipType(new Cursor(Uint8Array.of(1)), choice, registry)).toThrow(DecodeError);
    expect(() => decodeValue(new Cursor(Uint8Array.of(1)), choice, registry)).toThrow(
      "variant index 1 not found",
    );
  });

  it("reads sequences with a compact length", () => {
    const r = walk(registry, seqU16, [0x08, 1, 0, 2, 0]);
    expect(r.value).toEqual(Value.unnamed([p(1), p(2)]));
    expect(r.skippedTo).toBe(5);
  });

  it("skips sequences of non-primitive elements one by one", () => {
    const r = walk(registry, seqPoint, [0x08, 1, 1, 0, 2, 2, 0]);
    expect(r.skippedTo).toBe(7);
    expect(r.value).toEqual(
      Value.unnamed([Value.named([["a", p(1)], ["b", p(1)]]), Value.named([["a", p(2)], ["b", p(2)]])]),
    );
  });

  it("reads fixed arrays without a length", () => {
    const r = walk(registry, arr3, [7, 8, 9]);
    expect(r.value).toEqual(Value.unnamed([p(7), p(8), p(9)]));
    expect(r.skippedTo).toBe(3);
  });

  it("reads tuples in order", () => {
    const r = walk(registry, pair, [1, 0x0c, 0x61, 0x62, 0x63]);
    expect(r.value).toEqual(Value.unnamed([p(true), p("abc")]));
    expect(r.skippedTo).toBe(5);
  });

  it("reads compacts as numbers or bigints by width", () => {
    expect(walk(registry, compactU32, [0x04]).value).toEqual(p(1));
    expect(walk(registry, compactU128, [0x01, 0x01]).value).toEqual(p(64n));
    expect(walk(registry, compactU128, [0x01, 0x01]).skippedTo).toBe(2);
  });

  it("reads a compact through a single-field wrapper", () => {
    expect(walk(registry, compactWrapped, [0x08]).value).toEqual(Value.named([["inner", p(2)]]));
  });

  it("reads Lsb0 bit sequences", () => {
    const r = walk(registry, bitsLsb, [0x28, 0b0000_0101, 0b0000_0010]);
    expect(r.value).toEqual({
      kind: "bitSequence",
      value: [true, false, true, false, false, false, false, false, false, true],
    });
    expect(r.skippedTo).toBe(3);
  });

  it("reads Msb0 bit sequences", () => {
    const r = walk(registry, bitsMsb, [0x28, 0b1010_0000, 0b0100_0000]);
    expect(r.value).toEqual({
      kind: "bitSequence",
      value: [true, false, true, false, false, false, false, false, false, true],
    });
  });

  it("rejects a bit store that is not an unsigned integer", () => {
    expect(() => skipType(new Cursor(Uint8Array.of(0)), bitsBadStore, registry)).toThrow(
      DecodeError,
    );
  });

  it("rejects bool bytes other than 0 and 1", () => {
    expect(() => decodeValue(new Cursor(Uint8Array.of(2)), bool, registry)).toThrow(DecodeError);
  });

  it("throws IntegrityError for an unregistered type", () => {
    expect(() => skipType(new Cursor(Uint8Array.of(0)), 999, registry)).toThrow(IntegrityError);
  });

  it("decodeAll refuses trailing bytes", () => {
    expect(decodeAll(Uint8Array.of(1, 0, 0, 0), u32, registry, decodeValue)).toEqual(p(1));
    expect(() => decodeAll(Uint8Array.of(1, 0, 0, 0, 0), u32, registry, decodeValue)).toThrow(
      "1 trailing bytes",
    );
  });
});

describe("sequences of zero-sized elements", () => {
  const b = new RegistryBuilder();
  const unit = b.unit();
  const empty = b.add({ kind: "Composite", fields: [] });
  const u8 = b.primitive("u8");
  const seqUnit = b.add({ kind: "Sequence", typeParam: unit });
  const seqEmpty = b.add({ kind: "Sequence", typeParam: empty });
  const pair = b.add({ kind: "Tuple", fields: [seqUnit, u8] });
  const registry = b.build();
  // compact 2^40, big-integer mode
  const huge = () => Uint8Array.of(0b0000_1011, 0, 0, 0, 0, 0, 1);

  it("skips a huge declared length in one step", () => {
    const c = new Cursor(huge());
    skipType(c, seqUnit, registry);
    expect(c.offset).toBe(7);
  });

  it("leaves the cursor on whatever follows", () => {
    const c = new Cursor(Uint8Array.of(0x0c, 0x2a));
    skipType(c, pair, registry);
    expect(c.offset).toBe(2);
  });

  it("refuses to decode more elements than bytes remain", () => {
    expect(() => decodeValue(new Cursor(huge()), seqUnit, registry)).toThrow(DecodeError);
    expect(() => decodeValue(new Cursor(huge()), seqEmpty, registry)).toThrow(
      "declares 1099511627776 elements with 0 bytes left",
    );
  });

  it("decodes a short one", () => {
    expect(decodeValue(new Cursor(Uint8Array.of(0x08, 0xff, 0xff)), seqUnit, registry)).toEqual(
      Value.unnamed([Value.unnamed([]), Value.unnamed([])]),
    );
  });
});

describe("RegistryBuilder", () => {
  it("supports cycles through reserved ids", () => {
    const b = new RegistryBuilder();
    const a = b.reserve();
    const list = b.add({ kind: "Sequence", typeParam: a });
    b.define(a, { kind: "Composite", fields: [{ name: "children", ty: list }] });
    const registry = b.build();

    // two levels: one child with no children
    const r = walk(registry, a, [0x04, 0x00]);
    expect(r.skippedTo).toBe(2);
    expect(r.value).toEqual(
      Value.named([["children", Value.unnamed([Value.named([["children", Value.unnamed([])]])])]]),
    );
  });

  it("refuses to build with an undefined reservation", () => {
    const b = new RegistryBuilder();
    b.reserve();
    expect(() => b.build()).toThrow("reserved but never defined");
  });
});
