import { IntegrityError, frozenCopy, type PortableRegistry, type Variant } from "@ledgerkit/scale";
import { MetadataError } from "./errors.js";
import {
  getCallHash,
  getConstantHash,
  getPalletHash,
  getRuntimeApiHash,
  getRuntimeTraitHash,
  getStorageHash,
  type Digest,
} from "./hash.js";
import { MetadataHasher } from "./hasher.js";
import type {
  ConstantMetadata,
  ExtrinsicMetadata,
  MetadataDef,
  OuterEnumsMetadata,
  PalletMetadataDef,
  PalletStorageMetadata,
  RuntimeApiMetadataDef,
  RuntimeApiMethodMetadata,
  StorageEntryMetadata,
} from "./types.js";

/** A pallet plus the registry its type ids live in. */
export class PalletMetadata {
  private callsByIndex?: ReadonlyMap<number, Variant>;

  constructor(
    private readonly def: PalletMetadataDef,
    readonly types: PortableRegistry,
  ) {}

  get name(): string {
    return this.def.name;
  }

  get index(): number {
    return this.def.index;
  }

  get callTyId(): number | undefined {
    return this.def.callTy;
  }

  get eventTyId(): number | undefined {
    return this.def.eventTy;
  }

  get errorTyId(): number | undefined {
    return this.def.errorTy;
  }

  get storage(): PalletStorageMetadata | undefined {
    return this.def.storage;
  }

  get constants(): readonly ConstantMetadata[] {
    return this.def.constants;
  }

  /** Variants of the pallet's call enum, in declaration order. */
  callVariants(): readonly Variant[] {
    if (this.def.callTy === undefined) return [];
    const { def } = this.types.resolveOrThrow(this.def.callTy, `${this.name} calls`);
    return def.kind === "Variant" ? def.variants : [];
  }

  callVariantByIndex(index: number): Variant | undefined {
    this.callsByIndex ??= new Map(this.callVariants().map((v) => [v.index, v]));
    return this.callsByIndex.get(index);
  }

  callVariantByName(name: string): Variant | undefined {
    return this.callVariants().find((v) => v.name === name);
  }

  storageEntryByName(name: string): StorageEntryMetadata | undefined {
    return this.def.storage?.entries.find((e) => e.name === name);
  }

  constantByName(name: string): ConstantMetadata | undefined {
    return this.def.constants.find((c) => c.name === name);
  }

  hash(): Digest {
    return getPalletHash(this.types, this.def);
  }

  callHash(callName: string): Digest | undefined {
    return getCallHash(this.types, this.def, callName);
  }

  storageHash(entryName: string): Digest | undefined {
    return getStorageHash(this.types, this.def, entryName);
  }

  constantHash(constantName: string): Digest | undefined {
    return getConstantHash(this.types, this.def, constantName);
  }
}

/** One runtime API trait. */
export class RuntimeApiMetadata {
  constructor(
    private readonly def: RuntimeApiMetadataDef,
    readonly types: PortableRegistry,
  ) {}

  get name(): string {
    return this.def.name;
  }

  get methods(): readonly RuntimeApiMethodMetadata[] {
    return this.def.methods;
  }

  methodByName(name: string): RuntimeApiMethodMetadata | undefined {
    return this.def.methods.find((m) => m.name === name);
  }

  hash(): Digest {
    return getRuntimeTraitHash(this.types, this.def);
  }

  methodHash(methodName: string): Digest | undefined {
    return getRuntimeApiHash(this.types, this.def, methodName);
  }
}

// Every type id the snapshot declares at its top level must resolve.
function checkIntegrity(def: MetadataDef): void {
  const need = (id: number | undefined, context: string) => {
    if (id !== undefined && !def.types.has(id)) throw new IntegrityError(id, context);
  };
  for (const p of def.pallets) {
    need(p.callTy, `${p.name} calls`);
    need(p.eventTy, `${p.name} events`);
    need(p.errorTy, `${p.name} errors`);
    for (const c of p.constants) need(c.ty, `${p.name}.${c.name}`);
    for (const e of p.storage?.entries ?? []) {
      need(e.entryType.valueTy, `${p.name} storage ${e.name}`);
      if (e.entryType.kind === "Map") need(e.entryType.keyTy, `${p.name} storage ${e.name} key`);
    }
  }
  const x = def.extrinsic;
  need(x.addressTy, "extrinsic address");
  need(x.callTy, "extrinsic call");
  need(x.signatureTy, "extrinsic signature");
  need(x.extraTy, "extrinsic extra");
  for (const s of x.signedExtensions) {
    need(s.extraTy, `signed extension ${s.identifier}`);
    need(s.additionalTy, `signed extension ${s.identifier} additional`);
  }
  need(def.runtimeTy, "runtime");
  for (const api of def.apis) {
    for (const m of api.methods) {
      for (const i of m.inputs) need(i.ty, `${api.name}.${m.name}(${i.name})`);
      need(m.outputTy, `${api.name}.${m.name} output`);
    }
  }
  need(def.outerEnums.callEnumTy, "outer call enum");
  need(def.outerEnums.eventEnumTy, "outer event enum");
  need(def.outerEnums.errorEnumTy, "outer error enum");
}

/**
 * Immutable metadata snapshot. Safe to share between any number of decoders
 * and hashers; nothing here mutates after construction apart from lookup
 * indexes built on first use. Everything but the registry (which freezes
 * itself) is copied and frozen at construction. Byte arrays (constant values,
 * storage defaults) are copies too, but typed arrays cannot be frozen.
 *
 * Throws `IntegrityError` if a type id it declares is missing from `types`.
 */
export class Metadata {
  readonly types: PortableRegistry;
  private readonly palletList: readonly PalletMetadata[];
  private readonly palletsByIndex: ReadonlyMap<number, PalletMetadata>;
  private readonly palletsByName: ReadonlyMap<string, PalletMetadata>;
  private readonly apisByName: ReadonlyMap<string, RuntimeApiMetadata>;
  private readonly def: MetadataDef;

  constructor(def: MetadataDef) {
    checkIntegrity(def);
    const { types, ...rest } = def;
    this.def = Object.freeze({ types, ...frozenCopy(rest) });
    this.types = types;
    const pallets = this.def.pallets.map((p) => new PalletMetadata(p, types));
    this.palletList = pallets;
    this.palletsByIndex = new Map(pallets.map((p) => [p.index, p]));
    this.palletsByName = new Map(pallets.map((p) => [p.name, p]));
    this.apisByName = new Map(
      this.def.apis.map((a) => [a.name, new RuntimeApiMetadata(a, types)]),
    );
  }

  /** Pallets in the order the snapshot lists them. */
  pallets(): PalletMetadata[] {
    return [...this.palletList];
  }

  palletByIndex(index: number): PalletMetadata | undefined {
    return this.palletsByIndex.get(index);
  }

  palletByIndexOrThrow(index: number): PalletMetadata {
    const p = this.palletsByIndex.get(index);
    if (!p) throw new MetadataError("PalletIndexNotFound", index);
    return p;
  }

  palletByName(name: string): PalletMetadata | undefined {
    return this.palletsByName.get(name);
  }

  palletByNameOrThrow(name: string): PalletMetadata {
    const p = this.palletsByName.get(name);
    if (!p) throw new MetadataError("PalletNameNotFound", name);
    return p;
  }

  runtimeApiTraits(): RuntimeApiMetadata[] {
    return [...this.apisByName.values()];
  }

  runtimeApiTraitByName(name: string): RuntimeApiMetadata | undefined {
    return this.apisByName.get(name);
  }

  extrinsic(): ExtrinsicMetadata {
    return this.def.extrinsic;
  }

  outerEnums(): OuterEnumsMetadata {
    return this.def.outerEnums;
  }

  runtimeTy(): number {
    return this.def.runtimeTy;
  }

  hasher(): MetadataHasher {
    return new MetadataHasher(this);
  }
}
