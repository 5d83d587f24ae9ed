import {
  decodeFields,
  type Composite,
  type FieldsDecoder,
} from "@ledgerkit/scale";

/**
 * A call type known ahead of time (usually generated from metadata). It
 * matches an extrinsic when both names equal the ones resolved from the
 * snapshot, and then decodes the call's fields.
 */
export interface StaticExtrinsic<T> {
  readonly pallet: string;
  readonly call: string;
  readonly decodeFields: FieldsDecoder<T>;
}

/** Build a `StaticExtrinsic` from a mapping over the dynamically decoded fields. */
export function staticExtrinsic<T>(
  pallet: string,
  call: string,
  fromFields: (fields: Composite) => T,
): StaticExtrinsic<T> {
  return {
    pallet,
    call,
    decodeFields: (cursor, fields, registry) =>
      fromFields(decodeFields(cursor, fields, registry)),
  };
}
