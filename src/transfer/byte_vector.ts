/**
 * @file Growable byte buffer backing a transfer session
 *
 * A ByteVector is what a caller hands to `openWrite` to receive the bytes
 * directly (a borrowed buffer), and what the transfer file allocates for
 * itself otherwise (an owned buffer).
 */
import { toUint8 } from "../util/bin";

export type ByteVector = {
  readonly length: number;
  push(byte: number): void;
  append(bytes: Uint8Array): void;
  /** Set the length; bytes past the previous length are unspecified until written. */
  resize(length: number): void;
  /** Shrink to `length`; a larger value is ignored. */
  truncate(length: number): void;
  /** Live view of the current contents. Invalidated by any growth. */
  view(): Uint8Array;
  /** Copy of the current contents. */
  toUint8Array(): Uint8Array;
};

const MIN_CAPACITY = 64;

/** Create a ByteVector, optionally seeded with a copy of `initial`. */
export function createByteVector(initial?: Uint8Array | ArrayBuffer): ByteVector {
  const seed = initial ? toUint8(initial) : new Uint8Array(0);
  // eslint-disable-next-line no-restricted-syntax -- storage is replaced on growth
  let store = new Uint8Array(Math.max(MIN_CAPACITY, seed.length));
  store.set(seed);
  // eslint-disable-next-line no-restricted-syntax -- logical length within store
  let count = seed.length;

  function ensureCapacity(minCapacity: number): void {
    if (minCapacity <= store.length) {
      return;
    }
    const next = new Uint8Array(Math.max(store.length * 2, minCapacity));
    next.set(store.subarray(0, count));
    store = next;
  }

  return {
    get length() {
      return count;
    },
    push(byte: number): void {
      ensureCapacity(count + 1);
      store[count] = byte & 0xff;
      count += 1;
    },
    append(bytes: Uint8Array): void {
      ensureCapacity(count + bytes.length);
      store.set(bytes, count);
      count += bytes.length;
    },
    resize(length: number): void {
      ensureCapacity(length);
      count = length;
    },
    truncate(length: number): void {
      if (length < count) {
        count = Math.max(0, length);
      }
    },
    view(): Uint8Array {
      return store.subarray(0, count);
    },
    toUint8Array(): Uint8Array {
      return store.slice(0, count);
    },
  };
}
