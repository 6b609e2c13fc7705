/**
 * @file Read session over a loaded transfer buffer
 *
 * Reads never fail on running out of data: counts shrink to what was left and
 * the cursor stops at the end. Callers inspect the returned counts.
 */
import type { ByteVector } from "./byte_vector";
import type { SessionLease } from "./lease";
import { spanOf, requireInteger } from "./args";
import { TargetTooSmallError } from "./errors";
import { decodeNumbers, NUMBER_CODECS, reverseWindows } from "../util/bin";
import type { NumberKind } from "../util/bin";

const NEWLINE = 0x0a;

export type ReadSession = {
  readonly kind: "read";
  /** When true, `readSwapped` (and the number/string readers) reverse each element's bytes. */
  swap: boolean;
  readonly offset: number;
  readonly size: number;
  readonly remaining: number;
  /**
   * Copy one line into `target`, keeping the newline. At most `target.length - 1`
   * bytes are copied and a 0 byte follows them when there is room.
   * Returns the copied span, or null when the cursor was already at the end.
   */
  readLine(target: Uint8Array): Uint8Array | null;
  readLineText(maxLength: number): string | null;
  /** Copy up to `count` elements into `target` (or just skip them) and return the whole elements read. */
  read(elementSize: number, count: number, target?: Uint8Array | null): number;
  readSwapped(elementSize: number, count: number, target?: Uint8Array | null): number;
  readBytes(n: number): Uint8Array;
  readNumbers(kind: NumberKind, count: number): number[];
  /** u32 byte length then UTF-8 text; null if either part is cut short. */
  readString(): string | null;
  /** Advance by `n` bytes; false when fewer remained. */
  skip(n: number): boolean;
  rewind(): void;
};

/** Start reading `buffer` from offset 0 with swapping off. */
export function createReadSession(buffer: ByteVector, lease: SessionLease): ReadSession {
  const decoder = new TextDecoder();
  // eslint-disable-next-line no-restricted-syntax -- read cursor
  let cursor = 0;
  // eslint-disable-next-line no-restricted-syntax -- endian swap flag
  let swap = false;

  function data(): Uint8Array {
    lease.assertLive();
    return buffer.view();
  }

  function readLine(target: Uint8Array): Uint8Array | null {
    const src = data();
    // eslint-disable-next-line no-restricted-syntax -- bytes copied so far
    let n = 0;
    while (n + 1 < target.length && cursor < src.length) {
      const byte = src[cursor];
      cursor += 1;
      target[n] = byte;
      n += 1;
      if (byte === NEWLINE) {
        break;
      }
    }
    if (n < target.length) {
      target[n] = 0;
    }
    return n > 0 ? target.subarray(0, n) : null;
  }

  function read(elementSize: number, count: number, target?: Uint8Array | null): number {
    const src = data();
    const requested = spanOf(elementSize, count);
    if (requested === 0) {
      return 0;
    }
    const clamped = Math.min(requested, src.length - cursor);
    if (target) {
      if (target.length < clamped) {
        throw new TargetTooSmallError(clamped, target.length);
      }
      target.set(src.subarray(cursor, cursor + clamped));
    }
    cursor += clamped;
    return Math.floor(clamped / elementSize);
  }

  function readSwapped(elementSize: number, count: number, target?: Uint8Array | null): number {
    const n = read(elementSize, count, target);
    if (swap && target) {
      reverseWindows(target, elementSize, n);
    }
    return n;
  }

  function readBytes(n: number): Uint8Array {
    requireInteger("n", n);
    const out = new Uint8Array(Math.max(0, Math.min(n, data().length - cursor)));
    read(1, out.length, out);
    return out;
  }

  function readNumbers(kind: NumberKind, count: number): number[] {
    const { size } = NUMBER_CODECS[kind];
    const bytes = new Uint8Array(Math.min(spanOf(size, count), data().length - cursor));
    const n = readSwapped(size, count, bytes);
    return decodeNumbers(kind, bytes, n);
  }

  function readString(): string | null {
    const prefix = readNumbers("u32", 1);
    if (prefix.length === 0) {
      return null;
    }
    const length = prefix[0];
    const bytes = readBytes(length);
    if (bytes.length < length) {
      return null;
    }
    return decoder.decode(bytes);
  }

  return {
    kind: "read",
    get swap() {
      lease.assertLive();
      return swap;
    },
    set swap(value: boolean) {
      lease.assertLive();
      swap = value;
    },
    get offset() {
      lease.assertLive();
      return cursor;
    },
    get size() {
      return data().length;
    },
    get remaining() {
      return data().length - cursor;
    },
    readLine,
    readLineText(maxLength: number): string | null {
      requireInteger("maxLength", maxLength);
      const line = readLine(new Uint8Array(Math.max(0, maxLength)));
      return line ? decoder.decode(line) : null;
    },
    read,
    readSwapped,
    readBytes,
    readNumbers,
    readString,
    skip(n: number): boolean {
      requireInteger("n", n);
      const step = Math.max(0, Math.min(n, data().length - cursor));
      cursor += step;
      return step === Math.max(0, n);
    },
    rewind(): void {
      lease.assertLive();
      cursor = 0;
    },
  };
}
