/**
 * @file Error-like type guards
 */

function hasOwn<T extends string>(obj: unknown, key: T): obj is Record<T, unknown> {
  if (typeof obj !== "object" || obj === null) {
    return false;
  }
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Narrow to real Error instances. */
export function isError(e: unknown): e is Error {
  return e instanceof Error;
}

/** Narrow to objects that expose a code field (e.g., Node ENOENT). */
export function hasErrorCode(e: unknown): e is { code: unknown } {
  return hasOwn(e, "code");
}

/** Normalise a thrown value so callers always receive an Error. */
export function toError(e: unknown): Error {
  if (isError(e)) {
    return e;
  }
  if (hasOwn(e, "message")) {
    return new Error(String(e.message));
  }
  return new Error(String(e));
}
