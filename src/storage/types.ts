/**
 * @file Storage boundary types
 * The transfer file reaches storage only through a FileIO (whole-blob
 * loads/saves) and a ByteHandle (positioned reads).
 */

export type FileIO = {
  read(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array | ArrayBuffer): Promise<void>;
};

export type SeekOrigin = "start" | "current" | "end";

/** An open byte source with a position owned by whoever opened it. */
export type ByteHandle = {
  tell(): Promise<number>;
  /** Move the position and resolve to the new absolute position. */
  seek(offset: number, origin?: SeekOrigin): Promise<number>;
  /** Fill as much of `target` as possible from the current position; resolves to the byte count. */
  read(target: Uint8Array): Promise<number>;
};
