/**
 * @file Argument checks shared by both session kinds
 */
import { InvalidElementSizeError } from "./errors";

/** Byte count named by an element size and count; 0 when either is non-positive. */
export function spanOf(elementSize: number, count: number): number {
  requireInteger("elementSize", elementSize);
  requireInteger("count", count);
  if (elementSize <= 0 || count <= 0) {
    return 0;
  }
  return elementSize * count;
}

/** Throw InvalidElementSizeError unless `value` is an integer. */
export function requireInteger(what: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new InvalidElementSizeError(what, value);
  }
}
