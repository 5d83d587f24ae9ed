import type { Metadata } from "@ledgerkit/metadata";
import { Cursor, decodeAll, decodeValue, skipType, type Value } from "@ledgerkit/scale";
import { isBlockError, type Result } from "./errors.js";

/** The `extra` of one signed extension in a signed extrinsic. */
export class ExtrinsicSignedExtension {
  constructor(
    readonly identifier: string,
    readonly typeId: number,
    readonly bytes: Uint8Array,
    private readonly metadata: Metadata,
  ) {}

  value(): Value {
    return decodeAll(this.bytes, this.typeId, this.metadata.types, decodeValue);
  }
}

/**
 * The extra bytes of a signed extrinsic, split up per signed extension. The
 * snapshot's declared order is the order they were encoded in.
 */
export class ExtrinsicSignedExtensions {
  constructor(
    private readonly bytes: Uint8Array,
    private readonly metadata: Metadata,
  ) {}

  /** Stops after the first extension that cannot be skipped over. */
  *iter(): Generator<Result<ExtrinsicSignedExtension>, void, undefined> {
    const cursor = new Cursor(this.bytes);
    for (const ext of this.metadata.extrinsic().signedExtensions) {
      const start = cursor.offset;
      try {
        skipType(cursor, ext.extraTy, this.metadata.types);
      } catch (err) {
        if (!isBlockError(err)) throw err;
        yield { ok: false, error: err };
        return;
      }
      yield {
        ok: true,
        value: new ExtrinsicSignedExtension(
          ext.identifier,
          ext.extraTy,
          this.bytes.subarray(start, cursor.offset),
          this.metadata,
        ),
      };
    }
  }

  /** @throws the first decode error met before `identifier` is reached */
  find(identifier: string): ExtrinsicSignedExtension | undefined {
    for (const res of this.iter()) {
      if (!res.ok) throw res.error;
      if (res.value.identifier === identifier) return res.value;
    }
    return undefined;
  }

  /** Tip paid to the block author, from whichever payment extension the chain uses. */
  tip(): bigint | undefined {
    const ext = this.find("ChargeTransactionPayment") ?? this.find("ChargeAssetTxPayment");
    return ext && new Cursor(ext.bytes).compact();
  }

  nonce(): bigint | undefined {
    const ext = this.find("CheckNonce");
    return ext && new Cursor(ext.bytes).compact();
  }
}
