/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * The transfer file and its sessions live under src/transfer/*, the FileIO and
 * handle backends under src/storage/*.
 */

/**
 * Transfer file API
 * - createTransferFile: unopened transfer file bound to a FileIO and logger
 * - ReadSession / WriteSession: the two session kinds an open returns
 * @public
 */
export { createTransferFile } from "./transfer/transfer_file";
export type { TransferFile, TransferSession, OpenResult, Ownership } from "./transfer/transfer_file";
export type { ReadSession } from "./transfer/read_session";
export type { WriteSession, WriteResult } from "./transfer/write_session";
export type { TransferFileOptions, TransferReader, TransferWriter, TransferLogger } from "./transfer/options";

/**
 * Caller-owned buffers for borrowed write sessions
 * @public
 */
export { createByteVector } from "./transfer/byte_vector";
export type { ByteVector } from "./transfer/byte_vector";

/**
 * Errors
 * @public
 */
export {
  TransferError,
  StaleSessionError,
  InvalidElementSizeError,
  SourceTooShortError,
  TargetTooSmallError,
  ShortHandleReadError,
  InvalidSliceError,
} from "./transfer/errors";
export { FileNotFoundError, HandlePositionError } from "./storage/errors";

/**
 * Storage backends
 * @public
 */
export type { FileIO, ByteHandle, SeekOrigin } from "./storage/types";
export { createMemoryFileIO, createMemoryHandle } from "./storage/memory";
export { createNodeFileIO, openNodeHandle } from "./storage/node";
export type { NodeByteHandle } from "./storage/node";

/**
 * Endian helpers
 * @public
 */
export { reverseWindows } from "./util/bin";
export type { NumberKind } from "./util/bin";
