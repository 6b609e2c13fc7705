/**
 * @file Binary helpers shared by the transfer sessions
 *
 * - `toUint8`: accept either ArrayBuffer or Uint8Array at API boundaries
 * - `reverseWindows`: per-element byte reversal used for endian swapping
 * - `NUMBER_CODECS`: fixed-width number layouts, little-endian on the wire
 */

/** Convert ArrayBuffer to Uint8Array (no-copy when possible). */
export function toUint8(data: Uint8Array | ArrayBuffer): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

/**
 * Reverse the bytes of `count` consecutive `size`-byte windows of `bytes`, in place.
 * Windows keep their relative order; only the bytes inside each one move.
 */
export function reverseWindows(bytes: Uint8Array, size: number, count: number): void {
  if (size <= 1) {
    return;
  }
  for (let i = 0; i < count; i++) {
    bytes.subarray(i * size, (i + 1) * size).reverse();
  }
}

export type NumberKind = "i8" | "u8" | "i16" | "u16" | "i32" | "u32" | "f32" | "f64";

export type NumberCodec = {
  size: number;
  get(dv: DataView, off: number): number;
  set(dv: DataView, off: number, v: number): void;
};

export const NUMBER_CODECS: Record<NumberKind, NumberCodec> = {
  i8: { size: 1, get: (dv, off) => dv.getInt8(off), set: (dv, off, v) => dv.setInt8(off, v) },
  u8: { size: 1, get: (dv, off) => dv.getUint8(off), set: (dv, off, v) => dv.setUint8(off, v) },
  i16: { size: 2, get: (dv, off) => dv.getInt16(off, true), set: (dv, off, v) => dv.setInt16(off, v, true) },
  u16: { size: 2, get: (dv, off) => dv.getUint16(off, true), set: (dv, off, v) => dv.setUint16(off, v, true) },
  i32: { size: 4, get: (dv, off) => dv.getInt32(off, true), set: (dv, off, v) => dv.setInt32(off, v | 0, true) },
  u32: { size: 4, get: (dv, off) => dv.getUint32(off, true), set: (dv, off, v) => dv.setUint32(off, v >>> 0, true) },
  f32: { size: 4, get: (dv, off) => dv.getFloat32(off, true), set: (dv, off, v) => dv.setFloat32(off, v, true) },
  f64: { size: 8, get: (dv, off) => dv.getFloat64(off, true), set: (dv, off, v) => dv.setFloat64(off, v, true) },
};

/** Encode `values` as consecutive little-endian `kind` numbers. */
export function encodeNumbers(kind: NumberKind, values: readonly number[]): Uint8Array {
  const codec = NUMBER_CODECS[kind];
  const out = new Uint8Array(codec.size * values.length);
  const dv = new DataView(out.buffer);
  values.forEach((v, i) => codec.set(dv, i * codec.size, v));
  return out;
}

/** Decode the first `count` little-endian `kind` numbers of `bytes`. */
export function decodeNumbers(kind: NumberKind, bytes: Uint8Array, count: number): number[] {
  const codec = NUMBER_CODECS[kind];
  const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    out.push(codec.get(dv, i * codec.size));
  }
  return out;
}
