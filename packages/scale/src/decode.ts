// Registry-driven decoding: walk a type id's definition over a Cursor.
import { Cursor } from "./cursor.js";
import { DecodeError, expect } from "./errors.js";
import type {
  Field,
  Primitive,
  PortableRegistry,
  TypeDef,
  Variant,
} from "./registry.js";
import { Value, type Composite } from "./value.js";

type FixedPrimitive = Exclude<Primitive, "str">;

const WIDTH: Record<FixedPrimitive, number> = {
  bool: 1,
  char: 4,
  u8: 1,
  u16: 2,
  u32: 4,
  u64: 8,
  u128: 16,
  u256: 32,
  i8: 1,
  i16: 2,
  i32: 4,
  i64: 8,
  i128: 16,
  i256: 32,
};

const BIT_STORES: Partial<Record<Primitive, number>> = { u8: 1, u16: 2, u32: 4, u64: 8 };

/** Signature shared by anything that can decode a type id into a `T`. */
export type TypeDecoder<T> = (
  cursor: Cursor,
  typeId: number,
  registry: PortableRegistry,
) => T;

/** Same for a field list (a call's or a variant's arguments). */
export type FieldsDecoder<T> = (
  cursor: Cursor,
  fields: readonly Field[],
  registry: PortableRegistry,
) => T;

function variantAt(cursor: Cursor, def: { variants: readonly Variant[] }, typeId: number): Variant {
  const at = cursor.offset;
  const index = cursor.u8();
  const v = def.variants.find((x) => x.index === index);
  if (!v) throw new DecodeError(`variant index ${index} not found in type ${typeId}`, at);
  return v;
}

function fixedWidth(def: TypeDef): number | undefined {
  return def.kind === "Primitive" && def.primitive !== "str" ? WIDTH[def.primitive] : undefined;
}

function bitStoreBytes(registry: PortableRegistry, storeId: number): number {
  const { def } = registry.resolveOrThrow(storeId, "bit store");
  const bytes = def.kind === "Primitive" ? BIT_STORES[def.primitive] : undefined;
  if (bytes === undefined)
    throw new DecodeError(`bit store type ${storeId} is not u8, u16, u32 or u64`);
  return bytes;
}

function isMsb0(registry: PortableRegistry, orderId: number): boolean {
  const { path } = registry.resolveOrThrow(orderId, "bit order");
  return path !== undefined && path[path.length - 1] === "Msb0";
}

function bitSequenceBytes(bits: number, storeBytes: number): number {
  const wordBits = storeBytes * 8;
  return Math.ceil(bits / wordBits) * storeBytes;
}

/**
 * Advance `cursor` past exactly the bytes the type `typeId` occupies, without
 * building a value.
 */
export function skipType(cursor: Cursor, typeId: number, registry: PortableRegistry): void {
  const { def } = registry.resolveOrThrow(typeId);
  switch (def.kind) {
    case "Composite":
      for (const f of def.fields) skipType(cursor, f.ty, registry);
      return;
    case "Variant":
      for (const f of variantAt(cursor, def, typeId).fields) skipType(cursor, f.ty, registry);
      return;
    case "Sequence":
    case "Array": {
      const len = def.kind === "Array" ? def.len : cursor.compactNumber();
      const width = fixedWidth(registry.resolveOrThrow(def.typeParam).def);
      if (width !== undefined) {
        cursor.skip(len * width);
        return;
      }
      for (let i = 0; i < len; i++) {
        const at = cursor.offset;
        skipType(cursor, def.typeParam, registry);
        // zero-sized element type: the rest take no bytes either
        if (cursor.offset === at) return;
      }
      return;
    }
    case "Tuple":
      for (const id of def.fields) skipType(cursor, id, registry);
      return;
    case "Primitive":
      if (def.primitive === "str") cursor.skip(cursor.compactNumber());
      else cursor.skip(WIDTH[def.primitive]);
      return;
    case "Compact":
      cursor.compact();
      return;
    case "BitSequence": {
      const storeBytes = bitStoreBytes(registry, def.bitStoreType);
      cursor.skip(bitSequenceBytes(cursor.compactNumber(), storeBytes));
      return;
    }
  }
}

function decodePrimitive(cursor: Cursor, p: Primitive): Value {
  switch (p) {
    case "bool": {
      const at = cursor.offset;
      const b = cursor.u8();
      expect(b === 0 || b === 1, `invalid bool byte ${b}`, at);
      return Value.primitive(b === 1);
    }
    case "char": {
      const at = cursor.offset;
      const cp = Number(cursor.int(4));
      expect(cp <= 0x10ffff && (cp < 0xd800 || cp > 0xdfff), `invalid char ${cp}`, at);
      return Value.primitive(String.fromCodePoint(cp));
    }
    case "str":
      return Value.primitive(cursor.text());
    default:
      return Value.primitive(cursor.int(WIDTH[p], p.startsWith("i")));
  }
}

// Compact<T> holds an integer even when T is a single-field wrapper around one.
function compactValue(n: bigint, typeId: number, registry: PortableRegistry): Value {
  const { def } = registry.resolveOrThrow(typeId);
  if (def.kind === "Primitive" && def.primitive !== "str" && def.primitive !== "bool" && def.primitive !== "char") {
    return Value.primitive(WIDTH[def.primitive] <= 4 ? Number(n) : n);
  }
  if (def.kind === "Composite" && def.fields.length === 1) {
    const [f] = def.fields;
    if (f) {
      const inner = compactValue(n, f.ty, registry);
      return f.name ? Value.named([[f.name, inner]]) : Value.unnamed([inner]);
    }
  }
  if (def.kind === "Tuple" && def.fields.length === 1) {
    const [id] = def.fields;
    if (id !== undefined) return Value.unnamed([compactValue(n, id, registry)]);
  }
  throw new DecodeError(`type ${typeId} cannot be compact encoded`);
}

function decodeBits(
  cursor: Cursor,
  def: { bitOrderType: number; bitStoreType: number },
  registry: PortableRegistry,
): Value {
  const storeBytes = bitStoreBytes(registry, def.bitStoreType);
  const msb = isMsb0(registry, def.bitOrderType);
  const bits = cursor.compactNumber();
  const raw = cursor.bytes(bitSequenceBytes(bits, storeBytes));
  const wordBits = storeBytes * 8;
  const out = new Array<boolean>(bits);
  for (let i = 0; i < bits; i++) {
    const word = Math.floor(i / wordBits);
    const inWord = msb ? wordBits - 1 - (i % wordBits) : i % wordBits;
    // words are little endian, so bit k of a word sits in its byte k / 8
    const byte = raw[word * storeBytes + Math.floor(inWord / 8)] ?? 0;
    out[i] = ((byte >> (inWord % 8)) & 1) === 1;
  }
  return { kind: "bitSequence", value: out };
}

/** Decode one value of type `typeId`. */
export const decodeValue: TypeDecoder<Value> = (cursor, typeId, registry) => {
  const { def } = registry.resolveOrThrow(typeId);
  switch (def.kind) {
    case "Composite":
      return { kind: "composite", value: decodeFields(cursor, def.fields, registry) };
    case "Variant": {
      const v = variantAt(cursor, def, typeId);
      return Value.variant(v.name, decodeFields(cursor, v.fields, registry));
    }
    case "Sequence":
    case "Array": {
      const lenAt = cursor.offset;
      const len = def.kind === "Array" ? def.len : cursor.compactNumber();
      const items: Value[] = [];
      for (let i = 0; i < len; i++) {
        const at = cursor.offset;
        items.push(decodeValue(cursor, def.typeParam, registry));
        // a sequence of zero-sized elements may not declare more elements than bytes remain
        if (i === 0 && cursor.offset === at && def.kind === "Sequence") {
          expect(
            len <= cursor.remaining,
            `sequence of zero-sized type ${def.typeParam} declares ${len} elements with ${cursor.remaining} bytes left`,
            lenAt,
          );
        }
      }
      return Value.unnamed(items);
    }
    case "Tuple":
      return Value.unnamed(def.fields.map((id) => decodeValue(cursor, id, registry)));
    case "Primitive":
      return decodePrimitive(cursor, def.primitive);
    case "Compact":
      return compactValue(cursor.compact(), def.typeParam, registry);
    case "BitSequence":
      return decodeBits(cursor, def, registry);
  }
};

/**
 * Decode a field list in order. Named when every field has a name, unnamed
 * otherwise (tuple structs, tuple variants).
 */
export const decodeFields: FieldsDecoder<Composite> = (cursor, fields, registry) => {
  const decoded = fields.map((f) => [f.name, decodeValue(cursor, f.ty, registry)] as const);
  const named: Array<readonly [string, Value]> = [];
  for (const [name, v] of decoded) {
    if (name === undefined) return { kind: "unnamed", values: decoded.map(([, x]) => x) };
    named.push([name, v]);
  }
  return fields.length === 0 ? { kind: "unnamed", values: [] } : { kind: "named", fields: named };
};

/** Decode `bytes` as `typeId`, requiring every byte to be consumed. */
export function decodeAll<T>(
  bytes: Uint8Array,
  typeId: number,
  registry: PortableRegistry,
  decoder: TypeDecoder<T>,
): T {
  const cursor = new Cursor(bytes);
  const out = decoder(cursor, typeId, registry);
  expect(cursor.eof(), `${cursor.remaining} trailing bytes after type ${typeId}`, cursor.offset);
  return out;
}
