/**
 * @file In-memory FileIO and ByteHandle implementations
 */
import type { ByteHandle, FileIO, SeekOrigin } from "./types";
import { FileNotFoundError } from "./errors";
import { resolveSeek } from "./position";
import { toUint8 } from "../util/bin";

/** In-memory FileIO. Why: lightweight backend for tests and in-process blobs. */
export function createMemoryFileIO(initial?: Record<string, Uint8Array | ArrayBuffer>): FileIO {
  const store = new Map<string, Uint8Array>();
  if (initial) {
    for (const [k, v] of Object.entries(initial)) {
      store.set(k, toUint8(v).slice());
    }
  }

  return {
    async read(path: string): Promise<Uint8Array> {
      const v = store.get(path);
      if (!v) {
        throw new FileNotFoundError(path);
      }
      return new Uint8Array(v);
    },
    async write(path: string, data: Uint8Array | ArrayBuffer): Promise<void> {
      // copy so later mutation of the caller's bytes cannot reach the store
      store.set(path, toUint8(data).slice());
    },
  };
}

/**
 * Handle over an in-memory byte range. Reads past the end return short counts.
 * `start` sets the initial position, as if the caller had already consumed a header.
 */
export function createMemoryHandle(bytes: Uint8Array | ArrayBuffer, start = 0): ByteHandle {
  const data = toUint8(bytes);
  // eslint-disable-next-line no-restricted-syntax -- position is the handle's mutable state
  let position = resolveSeek(start, "start", 0, data.length);

  return {
    async tell(): Promise<number> {
      return position;
    },
    async seek(offset: number, origin: SeekOrigin = "start"): Promise<number> {
      position = resolveSeek(offset, origin, position, data.length);
      return position;
    },
    async read(target: Uint8Array): Promise<number> {
      const n = Math.max(0, Math.min(target.length, data.length - position));
      target.set(data.subarray(position, position + n));
      position += n;
      return n;
    },
  };
}
