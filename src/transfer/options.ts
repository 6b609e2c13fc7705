/**
 * @file Transfer file options and their defaults
 */
import type { FileIO } from "../storage/types";
import { createNodeFileIO } from "../storage/node";

/** Loads the whole blob stored under `path`. Rejecting means the open fails. */
export type TransferReader = (path: string) => Promise<Uint8Array>;

/** Persists `data` under `path`. Rejecting means the flush fails. */
export type TransferWriter = (data: Uint8Array, path: string) => Promise<void>;

export type TransferLogger = Pick<Console, "warn">;

export type TransferFileOptions = {
  /** Default loader/saver for `openRead` and `closeAndWrite`. Defaults to the Node file system. */
  io?: FileIO;
  /** Receives I/O failures. Defaults to `console`. */
  logger?: TransferLogger;
};

export type ResolvedTransferOptions = Required<TransferFileOptions>;

/** Fill in defaults for anything the caller left out. */
export function resolveTransferOptions(opts?: TransferFileOptions): ResolvedTransferOptions {
  return {
    io: opts?.io ?? createNodeFileIO(),
    logger: opts?.logger ?? console,
  };
}
