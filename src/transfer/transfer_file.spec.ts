/**
 * @file Tests for transfer file lifecycle, sources and buffer ownership
 */
import { createTransferFile } from "./transfer_file";
import { createByteVector } from "./byte_vector";
import { InvalidSliceError, ShortHandleReadError, StaleSessionError } from "./errors";
import { createMemoryFileIO, createMemoryHandle } from "../storage/memory";
import { FileNotFoundError } from "../storage/errors";
import type { ByteHandle } from "../storage/types";

describe("transfer/transfer_file", () => {
  const setup = () => {
    const io = createMemoryFileIO();
    const logger = { warn: vi.fn() };
    const tf = createTransferFile({ io, logger });
    return { io, logger, tf };
  };

  it("starts unopened", () => {
    const { tf } = setup();
    expect(tf.session).toBeUndefined();
    expect(tf.ownership).toBeUndefined();
  });

  it("round-trips bytes through write, flush and read", async () => {
    const { tf } = setup();
    const payload = new Uint8Array([0, 255, 10, 13, 42, 7]);
    const w = tf.openWrite();
    w.writeBytes(payload);
    expect((await w.closeAndWrite("blob.bin")).ok).toBe(true);

    const res = await tf.openRead("blob.bin");
    expect(res.ok).toBe(true);
    if (res.ok) {
      const target = new Uint8Array(payload.length);
      expect(res.session.read(1, payload.length, target)).toBe(payload.length);
      expect(Array.from(target)).toEqual(Array.from(payload));
      expect(tf.session).toBe(res.session);
    }
  });

  it("reports a missing path as a failed open", async () => {
    const { logger, tf } = setup();
    const res = await tf.openRead("nope.bin");
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(FileNotFoundError);
    }
    expect(tf.session).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("[TransferFile] failed to load nope.bin: file not found: nope.bin");
  });

  it("prefers a custom reader over the FileIO", async () => {
    const { tf } = setup();
    const reader = vi.fn(async (_path: string) => new Uint8Array([7, 8]));
    const res = await tf.openRead("anything", reader);
    expect(reader).toHaveBeenCalledWith("anything");
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(Array.from(res.session.readBytes(4))).toEqual([7, 8]);
    }
    expect(tf.ownership).toBe("owned");
  });

  it("copies memory ranges so later caller edits do not leak in", () => {
    const { tf } = setup();
    const src = new Uint8Array([1, 2, 3]);
    const s = tf.openReadFromMemory(src);
    src[0] = 9;
    expect(s.size).toBe(3);
    expect(Array.from(s.readBytes(3))).toEqual([1, 2, 3]);
  });

  it("reads a handle from its position to the end and consumes it", async () => {
    const { tf } = setup();
    const handle = createMemoryHandle(new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]), 3);
    const res = await tf.openReadFromHandle(handle);
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.session.size).toBe(7);
      expect(Array.from(res.session.readBytes(2))).toEqual([3, 4]);
    }
    expect(await handle.tell()).toBe(10);
  });

  it("reads a handle up to an end offset", async () => {
    const { tf } = setup();
    const handle = createMemoryHandle(new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]), 3);
    const res = await tf.openReadFromHandle(handle, 6);
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(Array.from(res.session.readBytes(10))).toEqual([3, 4, 5]);
    }
    expect(await handle.tell()).toBe(6);
  });

  it("fails a handle open on a short read", async () => {
    const { tf } = setup();
    const res = await tf.openReadFromHandle(createMemoryHandle(new Uint8Array(10)), 20);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(ShortHandleReadError);
      expect(res.error.message).toBe("short handle read: expected 20 bytes, got 10");
    }
    expect(tf.session).toBeUndefined();
  });

  it("fails a handle open whose end is before its position", async () => {
    const { tf } = setup();
    const res = await tf.openReadFromHandle(createMemoryHandle(new Uint8Array(10), 5), 2);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(InvalidSliceError);
    }
  });

  it("fails a handle open when positioning fails", async () => {
    const { logger, tf } = setup();
    const broken: ByteHandle = {
      tell: async () => {
        throw new Error("tell failed");
      },
      seek: async () => 0,
      read: async () => 0,
    };
    const res = await tf.openReadFromHandle(broken);
    expect(res.ok).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("[TransferFile] failed to read from handle: tell failed");
  });

  it("writes into a borrowed buffer and never drops it", () => {
    const { tf } = setup();
    const external = createByteVector(new Uint8Array([9, 9, 9]));
    const w = tf.openWrite(external);
    expect(external.length).toBe(0);
    expect(tf.ownership).toBe("borrowed");

    w.writeBytes(new Uint8Array([1, 2]));
    expect(Array.from(external.view())).toEqual([1, 2]);

    tf.openReadFromMemory(new Uint8Array([5]));
    expect(tf.ownership).toBe("owned");
    expect(Array.from(external.view())).toEqual([1, 2]);

    tf.close();
    expect(tf.ownership).toBeUndefined();
    expect(Array.from(external.view())).toEqual([1, 2]);
  });

  it("empties the owned buffer when reopened for writing", () => {
    const { tf } = setup();
    tf.openReadFromMemory(new Uint8Array([1, 2, 3]));
    const w = tf.openWrite();
    expect(tf.ownership).toBe("owned");
    expect(w.size).toBe(0);
  });

  it("resets swap on every open", () => {
    const { tf } = setup();
    const first = tf.openReadFromMemory(new Uint8Array([1, 2]));
    first.swap = true;
    const second = tf.openReadFromMemory(new Uint8Array([1, 2]));
    expect(second.swap).toBe(false);
  });

  it("revokes sessions on reopen and close", () => {
    const { tf } = setup();
    const r = tf.openReadFromMemory(new Uint8Array([1]));
    const w = tf.openWrite();
    expect(() => r.read(1, 1)).toThrow(StaleSessionError);
    tf.close();
    expect(tf.session).toBeUndefined();
    expect(() => w.writeBytes(new Uint8Array([1]))).toThrow(StaleSessionError);
  });

  it("drops an open that was superseded while loading", async () => {
    const { tf } = setup();
    // eslint-disable-next-line no-restricted-syntax -- resolved later by the test
    let release: (v: Uint8Array) => void = () => {};
    const pending = new Promise<Uint8Array>(resolve => {
      release = resolve;
    });
    const opening = tf.openRead("slow.bin", () => pending);
    const fresh = tf.openReadFromMemory(new Uint8Array([1]));
    release(new Uint8Array([2, 2]));

    const res = await opening;
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(StaleSessionError);
    }
    expect(tf.session).toBe(fresh);
    expect(Array.from(fresh.readBytes(4))).toEqual([1]);
  });

  it("keeps a handle read superseded mid-flight out of the newer session", async () => {
    const { tf } = setup();
    const slow: ByteHandle = {
      tell: async () => 0,
      seek: async () => 0,
      read: async (target: Uint8Array) => {
        await new Promise(resolve => setTimeout(resolve, 5));
        target.fill(0xee);
        return target.length;
      },
    };
    const opening = tf.openReadFromHandle(slow, 4);
    const fresh = tf.openReadFromMemory(new Uint8Array([1, 2, 3, 4]));

    const res = await opening;
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(StaleSessionError);
    }
    expect(tf.session).toBe(fresh);
    expect(Array.from(fresh.readBytes(4))).toEqual([1, 2, 3, 4]);
  });
});
