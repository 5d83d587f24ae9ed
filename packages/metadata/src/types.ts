import type { PortableRegistry } from "@ledgerkit/scale";

export type StorageEntryModifier = "Optional" | "Default";

// Declaration order is the byte used when hashing.
export const STORAGE_HASHERS = [
  "Blake2_128",
  "Blake2_256",
  "Blake2_128Concat",
  "Twox128",
  "Twox256",
  "Twox64Concat",
  "Identity",
] as const;

export type StorageHasher = (typeof STORAGE_HASHERS)[number];

export type StorageEntryType =
  | { readonly kind: "Plain"; readonly valueTy: number }
  | {
      readonly kind: "Map";
      readonly hashers: readonly StorageHasher[];
      readonly keyTy: number;
      readonly valueTy: number;
    };

export interface StorageEntryMetadata {
  readonly name: string;
  readonly modifier: StorageEntryModifier;
  readonly entryType: StorageEntryType;
  /** SCALE bytes of the default value. */
  readonly default: Uint8Array;
}

export interface PalletStorageMetadata {
  readonly prefix: string;
  readonly entries: readonly StorageEntryMetadata[];
}

export interface ConstantMetadata {
  readonly name: string;
  readonly ty: number;
  readonly value: Uint8Array;
}

export interface PalletMetadataDef {
  readonly name: string;
  /** u8 "pallet index" found at the start of encoded calls and events */
  readonly index: number;
  readonly callTy?: number;
  readonly eventTy?: number;
  readonly errorTy?: number;
  readonly storage?: PalletStorageMetadata;
  readonly constants: readonly ConstantMetadata[];
}

export interface SignedExtensionMetadata {
  readonly identifier: string;
  readonly extraTy: number;
  readonly additionalTy: number;
}

export interface ExtrinsicMetadata {
  readonly version: number;
  readonly addressTy: number;
  readonly callTy: number;
  readonly signatureTy: number;
  readonly extraTy: number;
  readonly signedExtensions: readonly SignedExtensionMetadata[];
}

export interface RuntimeApiMethodParam {
  readonly name: string;
  readonly ty: number;
}

export interface RuntimeApiMethodMetadata {
  readonly name: string;
  /** Positional; order matters. */
  readonly inputs: readonly RuntimeApiMethodParam[];
  readonly outputTy: number;
}

export interface RuntimeApiMetadataDef {
  readonly name: string;
  readonly methods: readonly RuntimeApiMethodMetadata[];
}

export interface OuterEnumsMetadata {
  readonly callEnumTy: number;
  readonly eventEnumTy: number;
  readonly errorEnumTy: number;
}

/** Everything a snapshot is built from. */
export interface MetadataDef {
  readonly types: PortableRegistry;
  readonly pallets: readonly PalletMetadataDef[];
  readonly extrinsic: ExtrinsicMetadata;
  readonly runtimeTy: number;
  readonly apis: readonly RuntimeApiMetadataDef[];
  readonly outerEnums: OuterEnumsMetadata;
}
