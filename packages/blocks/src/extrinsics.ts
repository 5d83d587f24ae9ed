import { createLogger } from "@ledgerkit/logger";
import type { Metadata } from "@ledgerkit/metadata";
import { stripCompactPrefix, toU8a } from "@ledgerkit/scale";
import { isBlockError, type Result } from "./errors.js";
import { ExtrinsicDetails, type FoundExtrinsic } from "./extrinsic-details.js";
import { extrinsicPartTypeIds, type ExtrinsicPartTypeIds } from "./extrinsic-part-ids.js";
import type { StaticExtrinsic } from "./static-extrinsic.js";

const log = createLogger("blocks");

/** The extrinsics of one block body, decoded lazily against one snapshot. */
export class Extrinsics {
  private readonly ids: ExtrinsicPartTypeIds;

  /**
   * @param extrinsics each extrinsic as it appears in the block body, compact
   * length prefix included, as bytes or hex
   */
  constructor(
    private readonly extrinsics: ReadonlyArray<Uint8Array | string>,
    private readonly metadata: Metadata,
  ) {
    this.ids = extrinsicPartTypeIds(metadata);
  }

  get length(): number {
    return this.extrinsics.length;
  }

  isEmpty(): boolean {
    return this.extrinsics.length === 0;
  }

  /**
   * Decode extrinsics one at a time, in block order. The first failure is
   * yielded once and ends the sequence: once one extrinsic cannot be read
   * nothing after it is trusted. A corrupt snapshot (`IntegrityError`) is
   * thrown rather than yielded.
   */
  *iter(): Generator<Result<ExtrinsicDetails>, void, undefined> {
    const { metadata, ids } = this;
    for (const [index, raw] of this.extrinsics.entries()) {
      let details: ExtrinsicDetails;
      try {
        const { rest } = stripCompactPrefix(toU8a(raw));
        details = ExtrinsicDetails.decodeFrom(index, rest, metadata, ids);
      } catch (err) {
        if (!isBlockError(err)) throw err;
        log.warn({ index, err: err.message }, "extrinsic failed to decode; stopping");
        yield { ok: false, error: err };
        return;
      }
      yield { ok: true, value: details };
    }
  }

  [Symbol.iterator](): Generator<Result<ExtrinsicDetails>, void, undefined> {
    return this.iter();
  }

  /**
   * Only the extrinsics that are `E`'s call, decoded to its type. An
   * extrinsic that cannot be read ends the sequence, as in `iter`. One that
   * reads but cannot be resolved or decoded as `E` is yielded as an error and
   * the search goes on.
   */
  *find<T>(E: StaticExtrinsic<T>): Generator<Result<FoundExtrinsic<T>>, void, undefined> {
    for (const res of this.iter()) {
      if (!res.ok) {
        yield res;
        return;
      }
      let value: T | undefined;
      try {
        value = res.value.asExtrinsic(E);
      } catch (err) {
        if (!isBlockError(err)) throw err;
        yield { ok: false, error: err };
        continue;
      }
      // some other pallet or call
      if (value === undefined) continue;
      yield { ok: true, value: { details: res.value, value } };
    }
  }

  /** @throws the first error met before a match */
  findFirst<T>(E: StaticExtrinsic<T>): FoundExtrinsic<T> | undefined {
    for (const res of this.find(E)) {
      if (!res.ok) throw res.error;
      return res.value;
    }
    return undefined;
  }

  /**
   * Walks the whole block; there is no way to search from the end.
   * @throws the error when the last item `find` yields is one
   */
  findLast<T>(E: StaticExtrinsic<T>): FoundExtrinsic<T> | undefined {
    let last: Result<FoundExtrinsic<T>> | undefined;
    for (const res of this.find(E)) last = res;
    if (!last) return undefined;
    if (!last.ok) throw last.error;
    return last.value;
  }

  has<T>(E: StaticExtrinsic<T>): boolean {
    return this.findFirst(E) !== undefined;
  }
}
