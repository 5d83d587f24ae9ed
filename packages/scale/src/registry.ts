import { IntegrityError } from "./errors.js";
import { frozenCopy } from "./freeze.js";

// Byte order of this list is the primitive kind's wire tag in hashing.
export const PRIMITIVES = [
  "bool",
  "char",
  "str",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "u256",
  "i8",
  "i16",
  "i32",
  "i64",
  "i128",
  "i256",
] as const;

export type Primitive = (typeof PRIMITIVES)[number];

export function primitiveTag(p: Primitive): number {
  return PRIMITIVES.indexOf(p);
}

export interface Field {
  readonly name?: string;
  readonly ty: number;
}

export interface Variant {
  readonly name: string;
  /** Wire discriminant; not necessarily the position in the variant list. */
  readonly index: number;
  readonly fields: readonly Field[];
}

export type TypeDef = Readonly<
  | { kind: "Composite"; fields: readonly Field[] }
  | { kind: "Variant"; variants: readonly Variant[] }
  | { kind: "Sequence"; typeParam: number }
  | { kind: "Array"; len: number; typeParam: number }
  | { kind: "Tuple"; fields: readonly number[] }
  | { kind: "Primitive"; primitive: Primitive }
  | { kind: "Compact"; typeParam: number }
  | { kind: "BitSequence"; bitOrderType: number; bitStoreType: number }
>;

export interface RegistryType {
  readonly id: number;
  readonly path?: readonly string[];
  readonly def: TypeDef;
}

/**
 * Type id -> definition. Ids are only meaningful within one registry.
 * Definitions are copied and frozen on the way in.
 */
export class PortableRegistry {
  private readonly byId: ReadonlyMap<number, RegistryType>;

  constructor(types: Iterable<RegistryType>) {
    const m = new Map<number, RegistryType>();
    for (const t of types) m.set(t.id, frozenCopy(t));
    this.byId = m;
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  resolve(id: number): RegistryType | undefined {
    return this.byId.get(id);
  }

  resolveOrThrow(id: number, context?: string): RegistryType {
    const ty = this.byId.get(id);
    if (!ty) throw new IntegrityError(id, context);
    return ty;
  }

  types(): IterableIterator<RegistryType> {
    return this.byId.values();
  }
}

/**
 * Assigns sequential ids. Cyclic types are built by reserving an id first
 * and defining it once the types that point back at it exist.
 */
export class RegistryBuilder {
  private readonly defs = new Map<number, RegistryType>();
  private readonly pending = new Set<number>();
  private next: number;

  constructor(firstId = 0) {
    this.next = firstId;
  }

  reserve(): number {
    const id = this.next++;
    this.pending.add(id);
    return id;
  }

  define(id: number, def: TypeDef, path?: readonly string[]): number {
    if (!this.pending.delete(id)) throw new Error(`type ${id} was not reserved`);
    this.defs.set(id, path ? { id, path, def } : { id, def });
    return id;
  }

  add(def: TypeDef, path?: readonly string[]): number {
    return this.define(this.reserve(), def, path);
  }

  primitive(primitive: Primitive): number {
    return this.add({ kind: "Primitive", primitive });
  }

  /** The unit type `()`. */
  unit(): number {
    return this.add({ kind: "Tuple", fields: [] });
  }

  build(): PortableRegistry {
    if (this.pending.size > 0)
      throw new Error(`types reserved but never defined: ${[...this.pending].join(", ")}`);
    return new PortableRegistry(this.defs.values());
  }
}
