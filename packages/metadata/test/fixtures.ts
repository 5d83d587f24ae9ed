import { RegistryBuilder, type Variant } from "@ledgerkit/scale";
import {
  Metadata,
  type ConstantMetadata,
  type ExtrinsicMetadata,
  type PalletMetadataDef,
  type RuntimeApiMetadataDef,
} from "../src/index.js";

export type PalletInput = Omit<PalletMetadataDef, "index" | "constants"> & {
  constants?: ConstantMetadata[];
};

export interface SnapshotInput {
  pallets: PalletInput[];
  apis?: RuntimeApiMetadataDef[];
  extrinsic?: Partial<ExtrinsicMetadata>;
}

/**
 * Build a snapshot the way a runtime would lay one out: pallets indexed by
 * position, outer enums with one variant per pallet, unit types wherever the
 * test does not care.
 */
export function snapshot(define: (b: RegistryBuilder) => SnapshotInput): Metadata {
  const b = new RegistryBuilder();
  const input = define(b);
  const unit = b.unit();

  const outer = (pick: (p: PalletInput) => number | undefined) => {
    const variants: Variant[] = [];
    input.pallets.forEach((p, index) => {
      const ty = pick(p);
      if (ty !== undefined) variants.push({ name: p.name, index, fields: [{ ty }] });
    });
    return b.add({ kind: "Variant", variants });
  };
  const callEnumTy = outer((p) => p.callTy);
  const eventEnumTy = outer((p) => p.eventTy);
  const errorEnumTy = outer((p) => p.errorTy);

  return new Metadata({
    types: b.build(),
    pallets: input.pallets.map((p, index) => ({ ...p, index, constants: p.constants ?? [] })),
    extrinsic: {
      version: 4,
      addressTy: unit,
      callTy: callEnumTy,
      signatureTy: unit,
      extraTy: unit,
      signedExtensions: [],
      ...input.extrinsic,
    },
    runtimeTy: unit,
    apis: input.apis ?? [],
    outerEnums: { callEnumTy, eventEnumTy, errorEnumTy },
  });
}
