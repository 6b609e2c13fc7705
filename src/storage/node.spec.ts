/**
 * @file Tests for Node.js FileIO adapter and handles
 */
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join as joinPath } from "node:path";
import { createNodeFileIO, openNodeHandle } from "./node";

describe("storage/node", () => {
  // eslint-disable-next-line no-restricted-syntax -- assigned per test
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(joinPath(tmpdir(), "transfer-io-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("read/write round-trips under the base directory", async () => {
    const io = createNodeFileIO(dir);
    await io.write("a/b.bin", new Uint8Array([1, 2, 3]));
    expect(Array.from(await io.read("a/b.bin"))).toEqual([1, 2, 3]);
    await io.write("a/b.bin", new Uint8Array([9]));
    expect(Array.from(await io.read("a/b.bin"))).toEqual([9]);
    expect(await readdir(joinPath(dir, "a"))).toEqual(["b.bin"]);
  });

  it("uses absolute paths as given", async () => {
    const io = createNodeFileIO(joinPath(dir, "elsewhere"));
    const abs = joinPath(dir, "abs.bin");
    await io.write(abs, new Uint8Array([5]));
    expect(Array.from(await createNodeFileIO(dir).read("abs.bin"))).toEqual([5]);
  });

  it("rejects reads of missing files", async () => {
    const io = createNodeFileIO(dir);
    await expect(io.read("missing.bin")).rejects.toThrow();
  });

  it("handle tracks its own position", async () => {
    const file = joinPath(dir, "h.bin");
    await writeFile(file, new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]));
    const h = await openNodeHandle(file);
    try {
      expect(await h.seek(4)).toBe(4);
      const target = new Uint8Array(3);
      expect(await h.read(target)).toBe(3);
      expect(Array.from(target)).toEqual([4, 5, 6]);
      expect(await h.tell()).toBe(7);
      expect(await h.seek(0, "end")).toBe(10);
      expect(await h.read(new Uint8Array(4))).toBe(0);
    } finally {
      await h.close();
    }
  });
});
