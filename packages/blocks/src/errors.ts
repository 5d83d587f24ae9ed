import { DecodeError } from "@ledgerkit/scale";
import { MetadataError } from "@ledgerkit/metadata";

/** The control byte names an extrinsic format version this decoder does not read. */
export class UnsupportedVersionError extends Error {
  override readonly name = "UnsupportedVersionError";

  constructor(readonly version: number) {
    super(`unsupported extrinsic version ${version}`);
  }
}

/** Failures an extrinsic sequence reports as an element instead of throwing. */
export type BlockError = DecodeError | UnsupportedVersionError | MetadataError;

export function isBlockError(err: unknown): err is BlockError {
  return (
    err instanceof DecodeError ||
    err instanceof UnsupportedVersionError ||
    err instanceof MetadataError
  );
}

export type Result<T, E = BlockError> =
  | { ok: true; value: T }
  | { ok: false; error: E };
