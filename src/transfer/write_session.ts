/**
 * @file Write session: appends to the transfer buffer, then flushes it once
 */
import type { ByteVector } from "./byte_vector";
import type { SessionLease } from "./lease";
import type { TransferWriter } from "./options";
import { spanOf } from "./args";
import { SourceTooShortError } from "./errors";
import { encodeNumbers } from "../util/bin";
import type { NumberKind } from "../util/bin";

export type WriteResult = { ok: true; bytes: number } | { ok: false; error: Error };

export type WriteSession = {
  readonly kind: "write";
  readonly size: number;
  /** Append `elementSize * count` bytes from the start of `source`; returns `count`, or 0 when nothing was named. */
  write(source: Uint8Array, elementSize: number, count: number): number;
  writeBytes(bytes: Uint8Array): number;
  writeNumbers(kind: NumberKind, values: readonly number[]): number;
  /** u32 byte length then UTF-8 text; returns the bytes appended. */
  writeString(text: string): number;
  bytes(): Uint8Array;
  /** Hand the accumulated bytes to `writer`, or to the default saver when omitted. */
  closeAndWrite(path: string, writer?: TransferWriter): Promise<WriteResult>;
};

/**
 * Start a write session on an already truncated `buffer`.
 * `flush` performs the save and reports the outcome; it belongs to the transfer file.
 */
export function createWriteSession(
  buffer: ByteVector,
  lease: SessionLease,
  flush: (data: Uint8Array, path: string, writer?: TransferWriter) => Promise<WriteResult>,
): WriteSession {
  const encoder = new TextEncoder();

  function write(source: Uint8Array, elementSize: number, count: number): number {
    lease.assertLive();
    const total = spanOf(elementSize, count);
    if (total === 0) {
      return 0;
    }
    if (source.length < total) {
      throw new SourceTooShortError(total, source.length);
    }
    buffer.append(source.subarray(0, total));
    return count;
  }

  return {
    kind: "write",
    get size() {
      lease.assertLive();
      return buffer.length;
    },
    write,
    writeBytes(bytes: Uint8Array): number {
      return write(bytes, 1, bytes.length);
    },
    writeNumbers(kind: NumberKind, values: readonly number[]): number {
      const bytes = encodeNumbers(kind, values);
      write(bytes, 1, bytes.length);
      return values.length;
    },
    writeString(text: string): number {
      const bytes = encoder.encode(text);
      const prefix = encodeNumbers("u32", [bytes.length]);
      write(prefix, 1, prefix.length);
      write(bytes, 1, bytes.length);
      return prefix.length + bytes.length;
    },
    bytes(): Uint8Array {
      lease.assertLive();
      return buffer.toUint8Array();
    },
    async closeAndWrite(path: string, writer?: TransferWriter): Promise<WriteResult> {
      lease.assertLive();
      return flush(buffer.toUint8Array(), path, writer);
    },
  };
}
