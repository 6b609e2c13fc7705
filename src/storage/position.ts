/**
 * @file Seek arithmetic shared by the handle backends
 */
import { HandlePositionError } from "./errors";
import type { SeekOrigin } from "./types";

/** Resolve a seek request to an absolute position, rejecting negative results. */
export function resolveSeek(offset: number, origin: SeekOrigin, current: number, size: number): number {
  const base = seekBase(origin, current, size);
  const next = base + offset;
  if (next < 0) {
    throw new HandlePositionError(next);
  }
  return next;
}

function seekBase(origin: SeekOrigin, current: number, size: number): number {
  if (origin === "current") {
    return current;
  }
  if (origin === "end") {
    return size;
  }
  return 0;
}
