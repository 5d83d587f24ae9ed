// Dynamic values produced when decoding against the registry.

export type PrimitiveValue = boolean | string | number | bigint;

export type Composite =
  | { kind: "named"; fields: ReadonlyArray<readonly [string, Value]> }
  | { kind: "unnamed"; values: readonly Value[] };

export type Value =
  | { kind: "composite"; value: Composite }
  | { kind: "variant"; name: string; value: Composite }
  | { kind: "primitive"; value: PrimitiveValue }
  | { kind: "bitSequence"; value: readonly boolean[] };

export const Value = {
  primitive: (value: PrimitiveValue): Value => ({ kind: "primitive", value }),
  named: (fields: ReadonlyArray<readonly [string, Value]>): Value => ({
    kind: "composite",
    value: { kind: "named", fields },
  }),
  unnamed: (values: readonly Value[]): Value => ({
    kind: "composite",
    value: { kind: "unnamed", values },
  }),
  variant: (name: string, value: Composite): Value => ({ kind: "variant", name, value }),
} as const;

/** Field of a named composite, by name. */
export function field(c: Composite, name: string): Value | undefined {
  if (c.kind !== "named") return undefined;
  return c.fields.find(([n]) => n === name)?.[1];
}

/** Values of a composite in declaration order, names dropped. */
export function values(c: Composite): readonly Value[] {
  return c.kind === "named" ? c.fields.map(([, v]) => v) : c.values;
}

export function asPrimitive(v: Value | undefined): PrimitiveValue | undefined {
  return v?.kind === "primitive" ? v.value : undefined;
}
