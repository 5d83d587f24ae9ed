import type { Metadata } from "@ledgerkit/metadata";

/**
 * Type ids of the generic parts of an unchecked extrinsic. Read once per
 * snapshot and reused for every extrinsic decoded against it.
 */
export interface ExtrinsicPartTypeIds {
  readonly address: number;
  /** Not needed to find boundaries; kept for checking call bytes against the outer enum. */
  readonly call: number;
  readonly signature: number;
  readonly extra: number;
}

export function extrinsicPartTypeIds(metadata: Metadata): ExtrinsicPartTypeIds {
  const x = metadata.extrinsic();
  return Object.freeze({
    address: x.addressTy,
    call: x.callTy,
    signature: x.signatureTy,
    extra: x.extraTy,
  });
}
