import { createLogger } from "@ledgerkit/logger";
import { hexToU8a } from "@ledgerkit/scale";
import { u8aEq } from "@polkadot/util";
import {
  concatAndHash,
  getExtrinsicHash,
  getOuterEnumsHash,
  getTypeHash,
  xor,
  zeroDigest,
  type Digest,
} from "./hash.js";
import type { Metadata } from "./metadata.js";

const log = createLogger("metadata");

/**
 * Hash of a whole snapshot, or of the part of it some generated code uses.
 * Obtained through `Metadata.hasher()`.
 */
export class MetadataHasher {
  private specificPallets?: readonly string[];
  private specificRuntimeApis?: readonly string[];

  constructor(private readonly metadata: Metadata) {}

  /** Only hash these pallets (and only their variants of the outer enums). Unknown names are ignored. */
  onlyThesePallets(names: readonly string[]): this {
    this.specificPallets = [...names];
    return this;
  }

  /** Only hash these runtime API traits. Unknown names are ignored. */
  onlyTheseRuntimeApis(names: readonly string[]): this {
    this.specificRuntimeApis = [...names];
    return this;
  }

  hash(): Digest {
    const { metadata, specificPallets, specificRuntimeApis } = this;
    log.debug(
      { pallets: specificPallets ?? "all", runtimeApis: specificRuntimeApis ?? "all" },
      "hashing metadata",
    );

    // pallets and APIs are XORed so the order they are listed in does not matter
    let palletHash = zeroDigest();
    for (const pallet of metadata.pallets()) {
      if (specificPallets && !specificPallets.includes(pallet.name)) continue;
      palletHash = xor(palletHash, pallet.hash());
    }

    let apisHash = zeroDigest();
    for (const api of metadata.runtimeApiTraits()) {
      if (specificRuntimeApis && !specificRuntimeApis.includes(api.name)) continue;
      apisHash = xor(apisHash, api.hash());
    }

    const extrinsicHash = getExtrinsicHash(metadata.types, metadata.extrinsic());
    const runtimeHash = getTypeHash(metadata.types, metadata.runtimeTy());
    const outerEnumsHash = getOuterEnumsHash(
      metadata.types,
      metadata.outerEnums(),
      specificPallets,
    );

    return concatAndHash(palletHash, apisHash, extrinsicHash, runtimeHash, outerEnumsHash);
  }

  /** Compare against a digest recorded when code was generated (bytes or hex). */
  matches(expected: Uint8Array | string): boolean {
    const want = typeof expected === "string" ? hexToU8a(expected) : expected;
    const ok = u8aEq(this.hash(), want);
    if (!ok) log.warn("metadata digest differs from the expected one");
    return ok;
  }
}
