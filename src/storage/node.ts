/**
 * @file Node.js file system storage adapter
 *
 * - `createNodeFileIO`: whole-blob load/save under a base directory; saves go
 *   through temp file + fsync + rename
 * - `openNodeHandle`: positioned reads over a `node:fs/promises` FileHandle
 */
import { readFile, rename, mkdir, rm, open } from "node:fs/promises";
import { dirname, resolve as resolvePath } from "node:path";
import type { ByteHandle, FileIO, SeekOrigin } from "./types";
import { resolveSeek } from "./position";
import { toUint8 } from "../util/bin";
import { hasErrorCode } from "../util/is-error";

function isRetryableError(error: unknown): boolean {
  if (!hasErrorCode(error)) {
    return false;
  }
  return error.code === "EBUSY" || error.code === "EMFILE" || error.code === "ENFILE";
}

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function retryOperation<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 100
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }
      // Exponential backoff with jitter
      const delay = baseDelay * Math.pow(2, attempt) + Math.random() * 50;
      await sleep(delay);
    }
  }
}

async function writeToTempFile(tmpPath: string, data: Uint8Array): Promise<void> {
  const fd = await open(tmpPath, "w");
  try {
    await fd.writeFile(data);
    await fd.sync();
  } finally {
    await fd.close();
  }
}

/**
 * Node FileIO. Relative paths resolve against `baseDir` (default: the working
 * directory); absolute paths are used as given.
 */
export function createNodeFileIO(baseDir: string = process.cwd()): FileIO {
  return {
    async read(path: string) {
      const u8 = await readFile(resolvePath(baseDir, path));
      const out = new Uint8Array(u8.byteLength);
      out.set(u8);
      return out;
    },
    async write(path: string, data) {
      const full = resolvePath(baseDir, path);
      await mkdir(dirname(full), { recursive: true });
      const tmp = `${full}.tmp`;
      try {
        await writeToTempFile(tmp, toUint8(data));
        await retryOperation(() => rename(tmp, full));
      } catch (error) {
        await rm(tmp, { force: true });
        throw error;
      }
    },
  };
}

export type NodeByteHandle = ByteHandle & {
  close(): Promise<void>;
};

/** Open `path` for positioned reads. The position starts at 0 and is tracked here, not by the fd. */
export async function openNodeHandle(path: string): Promise<NodeByteHandle> {
  const fd = await open(path, "r");
  // eslint-disable-next-line no-restricted-syntax -- position is the handle's mutable state
  let position = 0;

  return {
    async tell() {
      return position;
    },
    async seek(offset: number, origin: SeekOrigin = "start") {
      const size = origin === "end" ? (await fd.stat()).size : 0;
      position = resolveSeek(offset, origin, position, size);
      return position;
    },
    async read(target: Uint8Array) {
      // eslint-disable-next-line no-restricted-syntax -- accumulating partial reads
      let total = 0;
      while (total < target.length) {
        const { bytesRead } = await fd.read(target, total, target.length - total, position);
        if (bytesRead === 0) {
          break;
        }
        total += bytesRead;
        position += bytesRead;
      }
      return total;
    },
    async close() {
      await fd.close();
    },
  };
}
