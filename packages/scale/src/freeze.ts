function deepFreeze<T>(value: T): T {
  // typed arrays with elements cannot be frozen
  if (typeof value !== "object" || value === null || ArrayBuffer.isView(value)) return value;
  for (const v of Object.values(value)) deepFreeze(v);
  Object.freeze(value);
  return value;
}

/**
 * Deep copy of plain data, frozen all the way down. Byte arrays inside are
 * copied, so later writes to the caller's arrays do not reach the copy.
 */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
