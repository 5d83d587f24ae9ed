export type MetadataErrorKind =
  | "PalletIndexNotFound"
  | "PalletNameNotFound"
  | "VariantIndexNotFound";

/**
 * Something decoded from chain data points at a pallet or call the snapshot
 * does not have. Usually the bytes were produced by a different runtime
 * version than the metadata describes.
 */
export class MetadataError extends Error {
  override readonly name = "MetadataError";

  constructor(
    readonly kind: MetadataErrorKind,
    readonly key: string | number,
  ) {
    super(`${kind}: ${String(key)}`);
  }
}
