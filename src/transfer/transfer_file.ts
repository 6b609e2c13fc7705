/**
 * @file Transfer file: one object for loading and saving binary blobs
 *
 * A transfer file reads from a path, an in-memory range or an open handle, and
 * writes by appending to a buffer that is flushed once at the end. It holds at
 * most one session at a time:
 *
 * - `open*` calls return a ReadSession (cursor, swap flag, reads)
 * - `openWrite` returns a WriteSession (appends, closeAndWrite)
 *
 * Opening again or calling `close` revokes the previous session. The buffer is
 * either owned (allocated here, reused across opens, dropped on close) or
 * borrowed from the caller through `openWrite(external)`, in which case only
 * its contents are touched and it is never dropped.
 */
import { createByteVector } from "./byte_vector";
import type { ByteVector } from "./byte_vector";
import { createLeaseIssuer } from "./lease";
import type { SessionLease } from "./lease";
import { createReadSession } from "./read_session";
import type { ReadSession } from "./read_session";
import { createWriteSession } from "./write_session";
import type { WriteResult, WriteSession } from "./write_session";
import { resolveTransferOptions } from "./options";
import type { TransferFileOptions, TransferReader, TransferWriter } from "./options";
import { InvalidSliceError, ShortHandleReadError } from "./errors";
import type { ByteHandle } from "../storage/types";
import { toUint8 } from "../util/bin";
import { toError } from "../util/is-error";

export type Ownership = "owned" | "borrowed";

type Backing = { kind: "owned"; buffer: ByteVector } | { kind: "borrowed"; buffer: ByteVector };

export type TransferSession = ReadSession | WriteSession;

export type OpenResult = { ok: true; session: ReadSession } | { ok: false; error: Error };

export type TransferFile = {
  readonly session: TransferSession | undefined;
  readonly ownership: Ownership | undefined;
  /** Load everything stored under `path` through `reader`, or the configured FileIO. */
  openRead(path: string, reader?: TransferReader): Promise<OpenResult>;
  openReadFromMemory(bytes: Uint8Array | ArrayBuffer): ReadSession;
  /**
   * Read the handle from its current position to `endOffset`, or to its end when
   * omitted (the handle's position is restored after measuring). Anything short
   * of the full slice fails the open.
   */
  openReadFromHandle(handle: ByteHandle, endOffset?: number): Promise<OpenResult>;
  /** Write into `external` (borrowed, emptied first) or into an owned buffer. */
  openWrite(external?: ByteVector): WriteSession;
  close(): void;
};

/** Create an unopened transfer file. */
export function createTransferFile(options?: TransferFileOptions): TransferFile {
  const { io, logger } = resolveTransferOptions(options);
  const leases = createLeaseIssuer();
  // eslint-disable-next-line no-restricted-syntax -- buffer bound to the current session
  let backing: Backing | undefined;
  // eslint-disable-next-line no-restricted-syntax -- current session, if any
  let current: TransferSession | undefined;

  function ownedBuffer(): ByteVector {
    if (backing?.kind === "owned") {
      return backing.buffer;
    }
    const buffer = createByteVector();
    backing = { kind: "owned", buffer };
    return buffer;
  }

  function beginRead(buffer: ByteVector, lease: SessionLease): ReadSession {
    const session = createReadSession(buffer, lease);
    current = session;
    return session;
  }

  function fail(lease: SessionLease, what: string, cause: unknown): OpenResult {
    const error = toError(cause);
    logger.warn(`[TransferFile] ${what}: ${error.message}`);
    if (lease.isLive()) {
      current = undefined;
      ownedBuffer().truncate(0);
    }
    return { ok: false, error };
  }

  async function flush(data: Uint8Array, path: string, writer?: TransferWriter): Promise<WriteResult> {
    const save = writer ?? ((bytes: Uint8Array, p: string) => io.write(p, bytes));
    try {
      await save(data, path);
      return { ok: true, bytes: data.length };
    } catch (e) {
      const error = toError(e);
      logger.warn(`[TransferFile] failed to save ${path}: ${error.message}`);
      return { ok: false, error };
    }
  }

  async function openRead(path: string, reader?: TransferReader): Promise<OpenResult> {
    const lease = leases.issue();
    current = undefined;
    const load = reader ?? ((p: string) => io.read(p));
    try {
      const data = await load(path);
      // a later open started while this one was loading
      lease.assertLive();
      const buffer = ownedBuffer();
      buffer.resize(data.length);
      buffer.view().set(data);
      return { ok: true, session: beginRead(buffer, lease) };
    } catch (e) {
      return fail(lease, `failed to load ${path}`, e);
    }
  }

  function openReadFromMemory(bytes: Uint8Array | ArrayBuffer): ReadSession {
    const lease = leases.issue();
    const data = toUint8(bytes);
    const buffer = ownedBuffer();
    buffer.resize(data.length);
    buffer.view().set(data);
    return beginRead(buffer, lease);
  }

  async function measureEnd(handle: ByteHandle, start: number): Promise<number> {
    const end = await handle.seek(0, "end");
    await handle.seek(start, "start");
    return end;
  }

  async function openReadFromHandle(handle: ByteHandle, endOffset?: number): Promise<OpenResult> {
    const lease = leases.issue();
    current = undefined;
    try {
      const start = await handle.tell();
      const end = endOffset ?? (await measureEnd(handle, start));
      const size = end - start;
      if (size < 0) {
        throw new InvalidSliceError(start, end);
      }
      const slice = new Uint8Array(size);
      const got = await handle.read(slice);
      // a later open may own the buffer by now
      lease.assertLive();
      if (got !== size) {
        throw new ShortHandleReadError(size, got);
      }
      const buffer = ownedBuffer();
      buffer.resize(size);
      buffer.view().set(slice);
      return { ok: true, session: beginRead(buffer, lease) };
    } catch (e) {
      return fail(lease, "failed to read from handle", e);
    }
  }

  function openWrite(external?: ByteVector): WriteSession {
    const lease = leases.issue();
    const buffer = external ?? ownedBuffer();
    if (external) {
      backing = { kind: "borrowed", buffer: external };
    }
    buffer.truncate(0);
    const session = createWriteSession(buffer, lease, flush);
    current = session;
    return session;
  }

  return {
    get session() {
      return current;
    },
    get ownership() {
      return backing?.kind;
    },
    openRead,
    openReadFromMemory,
    openReadFromHandle,
    openWrite,
    close(): void {
      leases.revokeAll();
      current = undefined;
      backing = undefined;
    },
  };
}
