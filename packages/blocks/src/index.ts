export { Extrinsics } from "./extrinsics.js";
export { ExtrinsicDetails } from "./extrinsic-details.js";
export type { ExtrinsicMetadataDetails, FoundExtrinsic } from "./extrinsic-details.js";
export { extrinsicPartTypeIds } from "./extrinsic-part-ids.js";
export type { ExtrinsicPartTypeIds } from "./extrinsic-part-ids.js";
export { ExtrinsicSignedExtension, ExtrinsicSignedExtensions } from "./signed-extensions.js";
export { staticExtrinsic } from "./static-extrinsic.js";
export type { StaticExtrinsic } from "./static-extrinsic.js";
export { UnsupportedVersionError, isBlockError } from "./errors.js";
export type { BlockError, Result } from "./errors.js";
