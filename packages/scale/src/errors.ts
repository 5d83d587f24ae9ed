/** Malformed or insufficient bytes. */
export class DecodeError extends Error {
  override readonly name = "DecodeError";

  constructor(
    message: string,
    readonly offset?: number,
  ) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`);
  }
}

/**
 * A type id that the registry itself refers to is not registered. The
 * registry is corrupt; callers are not expected to recover from this.
 */
export class IntegrityError extends Error {
  override readonly name = "IntegrityError";

  constructor(readonly typeId: number, context?: string) {
    super(
      context
        ? `type ${typeId} is not in the registry (${context})`
        : `type ${typeId} is not in the registry`,
    );
  }
}

// tiny assert, raising DecodeError
export function expect(
  cond: unknown,
  msg: string,
  offset?: number,
): asserts cond {
  if (!cond) throw new DecodeError(msg, offset);
}
