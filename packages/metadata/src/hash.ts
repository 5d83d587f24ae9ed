// Deterministic digests over the type registry and the entities built on it.
// Two snapshots that describe the same shapes hash the same even when their
// type ids differ; unordered collections are XOR-folded so their order never
// matters.
import type { Field, PortableRegistry, TypeDef, Variant } from "@ledgerkit/scale";
import { primitiveTag } from "@ledgerkit/scale";
import { stringToU8a, u8aConcat } from "@polkadot/util";
import { xxhashAsU8a } from "@polkadot/util-crypto";
import {
  STORAGE_HASHERS,
  type ExtrinsicMetadata,
  type OuterEnumsMetadata,
  type PalletMetadataDef,
  type RuntimeApiMetadataDef,
  type RuntimeApiMethodMetadata,
  type StorageEntryMetadata,
} from "./types.js";

// The number of bytes `hash` produces.
export const HASH_LEN = 32;

export type Digest = Uint8Array;

// Wire tags for each shape, kept stable across releases.
const TypeBeingHashed = {
  Composite: 0,
  Variant: 1,
  Sequence: 2,
  Array: 3,
  Tuple: 4,
  Primitive: 5,
  Compact: 6,
  BitSequence: 7,
} as const;

const MODIFIER = { Optional: 0, Default: 1 } as const;

function filled(byte: number): Digest {
  return new Uint8Array(HASH_LEN).fill(byte);
}

export function zeroDigest(): Digest {
  return filled(0);
}

/** twox-256 */
export function hash(data: Uint8Array): Digest {
  return xxhashAsU8a(data, 256, true);
}

function hashStr(s: string): Digest {
  return hash(stringToU8a(s));
}

/** XOR two digests. Only for things whose order must not matter. */
export function xor(a: Digest, b: Digest): Digest {
  const out = new Uint8Array(HASH_LEN);
  for (let i = 0; i < HASH_LEN; i++) out[i] = (a[i] ?? 0) ^ (b[i] ?? 0);
  return out;
}

function xorFold<T>(items: Iterable<T>, f: (item: T) => Digest): Digest {
  let acc = zeroDigest();
  for (const item of items) acc = xor(acc, f(item));
  return acc;
}

/** Hash of the concatenation of some number of digests. */
export function concatAndHash(...digests: Digest[]): Digest {
  return hash(u8aConcat(...digests));
}

/** Cache slot per type id: computation started, or finished with a hash. */
export type CachedHash = { kind: "Recursive" } | { kind: "Hash"; hash: Digest };

export type HashCache = Map<number, CachedHash>;

// Every back-reference into a type still being hashed becomes this value.
// Different cycles closing at the same point therefore collide; existing
// digests depend on it, so it stays.
const RECURSIVE_HASH = filled(123);

function getFieldHash(registry: PortableRegistry, field: Field, cache: HashCache): Digest {
  const nameBytes = field.name === undefined ? zeroDigest() : hashStr(field.name);
  return concatAndHash(nameBytes, getTypeHash(registry, field.ty, cache));
}

/** Hash of one enum variant: its name and, order-free, its fields. */
export function getVariantHash(
  registry: PortableRegistry,
  variant: Variant,
  cache: HashCache,
): Digest {
  const fieldBytes = xorFold(variant.fields, (f) => getFieldHash(registry, f, cache));
  return concatAndHash(hashStr(variant.name), fieldBytes);
}

// Wire indexes are left out on purpose: values are matched to variants by name.
function getTypeDefVariantHash(
  registry: PortableRegistry,
  variants: readonly Variant[],
  onlyTheseVariants: readonly string[] | undefined,
  cache: HashCache,
): Digest {
  const included = onlyTheseVariants
    ? variants.filter((v) => onlyTheseVariants.includes(v.name))
    : variants;
  const variantBytes = xorFold(included, (v) => getVariantHash(registry, v, cache));
  return concatAndHash(filled(TypeBeingHashed.Variant), variantBytes);
}

function getTypeDefHash(registry: PortableRegistry, def: TypeDef, cache: HashCache): Digest {
  switch (def.kind) {
    case "Composite": {
      const fieldBytes = xorFold(def.fields, (f) => getFieldHash(registry, f, cache));
      return concatAndHash(filled(TypeBeingHashed.Composite), fieldBytes);
    }
    case "Variant":
      return getTypeDefVariantHash(registry, def.variants, undefined, cache);
    case "Sequence":
      return concatAndHash(
        filled(TypeBeingHashed.Sequence),
        getTypeHash(registry, def.typeParam, cache),
      );
    case "Array": {
      // length is part of the id slot so [T; 2] and [T; 3] never collide
      const idBytes = zeroDigest();
      idBytes[0] = TypeBeingHashed.Array;
      new DataView(idBytes.buffer).setUint32(1, def.len, false);
      return concatAndHash(idBytes, getTypeHash(registry, def.typeParam, cache));
    }
    case "Tuple": {
      let bytes = hash(Uint8Array.of(TypeBeingHashed.Tuple));
      for (const id of def.fields) bytes = concatAndHash(bytes, getTypeHash(registry, id, cache));
      return bytes;
    }
    case "Primitive":
      return hash(Uint8Array.of(TypeBeingHashed.Primitive, primitiveTag(def.primitive)));
    case "Compact":
      return concatAndHash(
        filled(TypeBeingHashed.Compact),
        getTypeHash(registry, def.typeParam, cache),
      );
    case "BitSequence":
      return concatAndHash(
        filled(TypeBeingHashed.BitSequence),
        getTypeHash(registry, def.bitOrderType, cache),
        getTypeHash(registry, def.bitStoreType, cache),
      );
  }
}

/**
 * Hash of the type graph reachable from `id`.
 *
 * Recursive types are handled with two cache states: a type is marked
 * `Recursive` before its definition is walked, and any lookup that lands on
 * that mark returns the fixed recursive hash instead of descending again.
 * Once the walk returns the slot is replaced with the finished hash.
 *
 * Throws `IntegrityError` if `id`, or anything it references, is missing.
 */
export function getTypeHash(
  registry: PortableRegistry,
  id: number,
  cache: HashCache = new Map(),
): Digest {
  const cached = cache.get(id);
  if (cached) return cached.kind === "Hash" ? cached.hash : RECURSIVE_HASH;

  cache.set(id, { kind: "Recursive" });
  const { def } = registry.resolveOrThrow(id);
  const typeHash = getTypeDefHash(registry, def, cache);
  cache.set(id, { kind: "Hash", hash: typeHash });
  return typeHash;
}

/** Type hashing with one cache kept across calls, for batches over one registry. */
export class TypeHasher {
  private readonly cache: HashCache = new Map();

  constructor(private readonly registry: PortableRegistry) {}

  hash(id: number): Digest {
    return getTypeHash(this.registry, id, this.cache);
  }

  cached(id: number): CachedHash | undefined {
    return this.cache.get(id);
  }
}

/** Address, signature and extra types, the version, and the signed extensions in order. */
export function getExtrinsicHash(
  registry: PortableRegistry,
  extrinsic: ExtrinsicMetadata,
): Digest {
  const cache: HashCache = new Map();
  // The call type is left to the outer enums hash.
  let bytes = concatAndHash(
    getTypeHash(registry, extrinsic.addressTy, cache),
    getTypeHash(registry, extrinsic.signatureTy, cache),
    getTypeHash(registry, extrinsic.extraTy, cache),
    filled(extrinsic.version),
  );
  for (const ext of extrinsic.signedExtensions) {
    bytes = concatAndHash(
      bytes,
      hashStr(ext.identifier),
      getTypeHash(registry, ext.extraTy, cache),
      getTypeHash(registry, ext.additionalTy, cache),
    );
  }
  return bytes;
}

function getEnumHash(
  registry: PortableRegistry,
  id: number,
  onlyTheseVariants: readonly string[] | undefined,
): Digest {
  const { def } = registry.resolveOrThrow(id, "outer enum");
  return def.kind === "Variant"
    ? getTypeDefVariantHash(registry, def.variants, onlyTheseVariants, new Map())
    : getTypeHash(registry, id);
}

/** Call, event and error enums; variants outside `onlyTheseVariants` are left out entirely. */
export function getOuterEnumsHash(
  registry: PortableRegistry,
  enums: OuterEnumsMetadata,
  onlyTheseVariants?: readonly string[],
): Digest {
  return concatAndHash(
    getEnumHash(registry, enums.callEnumTy, onlyTheseVariants),
    getEnumHash(registry, enums.eventEnumTy, onlyTheseVariants),
    getEnumHash(registry, enums.errorEnumTy, onlyTheseVariants),
  );
}

export function getStorageEntryHash(
  registry: PortableRegistry,
  entry: StorageEntryMetadata,
  cache: HashCache = new Map(),
): Digest {
  let bytes = concatAndHash(
    hashStr(entry.name),
    filled(MODIFIER[entry.modifier]),
    hash(entry.default),
  );
  const ty = entry.entryType;
  if (ty.kind === "Plain") return concatAndHash(bytes, getTypeHash(registry, ty.valueTy, cache));

  for (const hasher of ty.hashers) {
    bytes = concatAndHash(bytes, filled(STORAGE_HASHERS.indexOf(hasher)));
  }
  return concatAndHash(
    bytes,
    getTypeHash(registry, ty.keyTy, cache),
    getTypeHash(registry, ty.valueTy, cache),
  );
}

export function getRuntimeMethodHash(
  registry: PortableRegistry,
  traitName: string,
  method: RuntimeApiMethodMetadata,
  cache: HashCache = new Map(),
): Digest {
  // The trait name belongs to the call generated for the method, same as a parameter.
  let bytes = concatAndHash(hashStr(traitName), hashStr(method.name));
  for (const input of method.inputs) {
    bytes = concatAndHash(bytes, hashStr(input.name), getTypeHash(registry, input.ty, cache));
  }
  return concatAndHash(bytes, getTypeHash(registry, method.outputTy, cache));
}

export function getRuntimeTraitHash(
  registry: PortableRegistry,
  api: RuntimeApiMetadataDef,
): Digest {
  const cache: HashCache = new Map();
  const methodBytes = xorFold(api.methods, (m) =>
    getRuntimeMethodHash(registry, api.name, m, cache),
  );
  return concatAndHash(hashStr(api.name), methodBytes);
}

/** Type hash of `method` within `api`, or `undefined` when there is no such method. */
export function getRuntimeApiHash(
  registry: PortableRegistry,
  api: RuntimeApiMetadataDef,
  methodName: string,
): Digest | undefined {
  const method = api.methods.find((m) => m.name === methodName);
  return method && getRuntimeMethodHash(registry, api.name, method);
}

export function getStorageHash(
  registry: PortableRegistry,
  pallet: PalletMetadataDef,
  entryName: string,
): Digest | undefined {
  const entry = pallet.storage?.entries.find((e) => e.name === entryName);
  return entry && getStorageEntryHash(registry, entry);
}

/** Only the constant's type is compared, never its value. */
export function getConstantHash(
  registry: PortableRegistry,
  pallet: PalletMetadataDef,
  constantName: string,
): Digest | undefined {
  const constant = pallet.constants.find((c) => c.name === constantName);
  return constant && getTypeHash(registry, constant.ty);
}

export function getCallHash(
  registry: PortableRegistry,
  pallet: PalletMetadataDef,
  callName: string,
): Digest | undefined {
  if (pallet.callTy === undefined) return undefined;
  const { def } = registry.resolveOrThrow(pallet.callTy, `${pallet.name} calls`);
  if (def.kind !== "Variant") return undefined;
  const variant = def.variants.find((v) => v.name === callName);
  return variant && getVariantHash(registry, variant, new Map());
}

export function getPalletHash(registry: PortableRegistry, pallet: PalletMetadataDef): Digest {
  const cache: HashCache = new Map();
  const optional = (id: number | undefined) =>
    id === undefined ? zeroDigest() : getTypeHash(registry, id, cache);

  const constantBytes = xorFold(pallet.constants, (c) =>
    concatAndHash(hashStr(c.name), getTypeHash(registry, c.ty, cache)),
  );
  const storage = pallet.storage;
  const storageBytes = storage
    ? concatAndHash(
        hashStr(storage.prefix),
        xorFold(storage.entries, (e) => getStorageEntryHash(registry, e, cache)),
      )
    : zeroDigest();

  return concatAndHash(
    optional(pallet.callTy),
    optional(pallet.eventTy),
    optional(pallet.errorTy),
    constantBytes,
    storageBytes,
  );
}
