import { createLogger } from "@ledgerkit/logger";
import type { Metadata, PalletMetadata } from "@ledgerkit/metadata";
import { MetadataError } from "@ledgerkit/metadata";
import {
  Cursor,
  blakeTwo256,
  concatU8a,
  decodeFields,
  decodeValue,
  encodeCompact,
  skipType,
  type Composite,
  type TypeDecoder,
  type Value,
  type Variant,
} from "@ledgerkit/scale";
import { UnsupportedVersionError } from "./errors.js";
import type { ExtrinsicPartTypeIds } from "./extrinsic-part-ids.js";
import { ExtrinsicSignedExtensions } from "./signed-extensions.js";
import type { StaticExtrinsic } from "./static-extrinsic.js";

const log = createLogger("blocks");

const SIGNATURE_MASK = 0b1000_0000;
const VERSION_MASK = 0b0111_1111;
const LATEST_EXTRINSIC_VERSION = 4;

/** Offsets into the extrinsic bytes that only signed extrinsics have. */
interface SignedExtrinsicDetails {
  addressStartIdx: number;
  /** also where the signature starts */
  addressEndIdx: number;
  /** also where the extra starts */
  signatureEndIdx: number;
  extraEndIdx: number;
}

/** The pallet and call variant an extrinsic resolves to in the snapshot. */
export interface ExtrinsicMetadataDetails {
  pallet: PalletMetadata;
  variant: Variant;
}

/**
 * One extrinsic of a block, with the boundaries of its parts found but its
 * contents left encoded. Everything else is read from those boundaries on
 * demand.
 */
export class ExtrinsicDetails {
  private constructor(
    /** Position of the extrinsic in its block. */
    readonly index: number,
    private readonly raw: Uint8Array,
    private readonly signed: SignedExtrinsicDetails | undefined,
    private readonly callStartIdx: number,
    readonly palletIndex: number,
    readonly variantIndex: number,
    private readonly metadata: Metadata,
  ) {}

  /**
   * Find the part boundaries of one extrinsic. `bytes` must already have the
   * compact length prefix removed.
   *
   * Layout: a control byte (bit 7 signed, bits 0-6 version), then for signed
   * extrinsics the address, signature and extra, then the pallet index, the
   * call index and the call's fields.
   *
   * @throws DecodeError when the bytes run out or do not fit the types
   * @throws UnsupportedVersionError for any version but 4
   */
  static decodeFrom(
    index: number,
    bytes: Uint8Array,
    metadata: Metadata,
    ids: ExtrinsicPartTypeIds,
  ): ExtrinsicDetails {
    const cursor = new Cursor(bytes);
    const first = cursor.u8();

    const version = first & VERSION_MASK;
    if (version !== LATEST_EXTRINSIC_VERSION) throw new UnsupportedVersionError(version);

    let signed: SignedExtrinsicDetails | undefined;
    if ((first & SIGNATURE_MASK) !== 0) {
      const types = metadata.types;
      const addressStartIdx = cursor.offset;
      skipType(cursor, ids.address, types);
      const addressEndIdx = cursor.offset;
      skipType(cursor, ids.signature, types);
      const signatureEndIdx = cursor.offset;
      skipType(cursor, ids.extra, types);
      signed = { addressStartIdx, addressEndIdx, signatureEndIdx, extraEndIdx: cursor.offset };
    }

    const callStartIdx = cursor.offset;
    const palletIndex = cursor.u8();
    const variantIndex = cursor.u8();

    log.debug({ index, signed: signed !== undefined, palletIndex, variantIndex }, "decoded extrinsic");
    return new ExtrinsicDetails(
      index,
      bytes,
      signed,
      callStartIdx,
      palletIndex,
      variantIndex,
      metadata,
    );
  }

  isSigned(): boolean {
    return this.signed !== undefined;
  }

  /**
   * All of the extrinsic: control byte, then (if signed) address, signature
   * and extra, then the call.
   */
  bytes(): Uint8Array {
    return this.raw;
  }

  /** Pallet index byte, call index byte, then the field bytes. */
  callBytes(): Uint8Array {
    return this.raw.subarray(this.callStartIdx);
  }

  /** `callBytes()` without the two index bytes. Decoding checked that both are there. */
  fieldBytes(): Uint8Array {
    return this.raw.subarray(this.callStartIdx + 2);
  }

  addressBytes(): Uint8Array | undefined {
    const s = this.signed;
    return s && this.raw.subarray(s.addressStartIdx, s.addressEndIdx);
  }

  signatureBytes(): Uint8Array | undefined {
    const s = this.signed;
    return s && this.raw.subarray(s.addressEndIdx, s.signatureEndIdx);
  }

  /**
   * The `extra` of every signed extension, in the order the snapshot declares
   * them. The `additional` data that only goes into the signed payload is
   * not part of the extrinsic.
   */
  signedExtensionsBytes(): Uint8Array | undefined {
    const s = this.signed;
    return s && this.raw.subarray(s.signatureEndIdx, s.extraEndIdx);
  }

  signedExtensions(): ExtrinsicSignedExtensions | undefined {
    const extra = this.signedExtensionsBytes();
    return extra && new ExtrinsicSignedExtensions(extra, this.metadata);
  }

  /** Blake2-256 of the length-prefixed extrinsic, as the chain hashes it. */
  hash(): Uint8Array {
    return blakeTwo256(concatU8a(encodeCompact(this.raw.length), this.raw));
  }

  /** @throws MetadataError when the snapshot has no such pallet or call */
  extrinsicMetadata(): ExtrinsicMetadataDetails {
    const pallet = this.metadata.palletByIndexOrThrow(this.palletIndex);
    const variant = pallet.callVariantByIndex(this.variantIndex);
    if (!variant) throw new MetadataError("VariantIndexNotFound", this.variantIndex);
    return { pallet, variant };
  }

  palletName(): string {
    return this.extrinsicMetadata().pallet.name;
  }

  variantName(): string {
    return this.extrinsicMetadata().variant.name;
  }

  /** The call's fields, decoded dynamically against the call variant. */
  fieldValues(): Composite {
    const { variant } = this.extrinsicMetadata();
    return decodeFields(new Cursor(this.fieldBytes()), variant.fields, this.metadata.types);
  }

  /**
   * Decode into `E`'s type if this extrinsic is `E`'s pallet and call;
   * `undefined` if it is some other call.
   */
  asExtrinsic<T>(E: StaticExtrinsic<T>): T | undefined {
    const { pallet, variant } = this.extrinsicMetadata();
    if (pallet.name !== E.pallet || variant.name !== E.call) return undefined;
    return E.decodeFields(new Cursor(this.fieldBytes()), variant.fields, this.metadata.types);
  }

  /** Decode the whole call as the runtime's outer call enum. */
  asRootExtrinsic(): Value;
  asRootExtrinsic<T>(decoder: TypeDecoder<T>): T;
  asRootExtrinsic<T>(decoder?: TypeDecoder<T>): T | Value {
    const callEnumTy = this.metadata.outerEnums().callEnumTy;
    const cursor = new Cursor(this.callBytes());
    return decoder
      ? decoder(cursor, callEnumTy, this.metadata.types)
      : decodeValue(cursor, callEnumTy, this.metadata.types);
  }
}

/** A statically typed extrinsic found in a block, with its details. */
export interface FoundExtrinsic<T> {
  details: ExtrinsicDetails;
  value: T;
}
