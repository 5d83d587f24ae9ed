export { Metadata, PalletMetadata, RuntimeApiMetadata } from "./metadata.js";
export { MetadataHasher } from "./hasher.js";
export { MetadataError } from "./errors.js";
export type { MetadataErrorKind } from "./errors.js";
export {
  HASH_LEN,
  TypeHasher,
  concatAndHash,
  getCallHash,
  getConstantHash,
  getExtrinsicHash,
  getOuterEnumsHash,
  getPalletHash,
  getRuntimeApiHash,
  getRuntimeMethodHash,
  getRuntimeTraitHash,
  getStorageEntryHash,
  getStorageHash,
  getTypeHash,
  getVariantHash,
  hash,
  xor,
  zeroDigest,
} from "./hash.js";
export type { CachedHash, Digest, HashCache } from "./hash.js";
export { STORAGE_HASHERS } from "./types.js";
export type {
  ConstantMetadata,
  ExtrinsicMetadata,
  MetadataDef,
  OuterEnumsMetadata,
  PalletMetadataDef,
  PalletStorageMetadata,
  RuntimeApiMetadataDef,
  RuntimeApiMethodMetadata,
  RuntimeApiMethodParam,
  SignedExtensionMetadata,
  StorageEntryMetadata,
  StorageEntryModifier,
  StorageEntryType,
  StorageHasher,
} from "./types.js";
