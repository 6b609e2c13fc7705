/**
 * @file Storage error types
 */
/* eslint-disable no-restricted-syntax -- error classes */
/** Thrown by in-memory backends when nothing is stored under a path. */
export class FileNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`file not found: ${path}`);
    this.name = "FileNotFoundError";
  }
}

/** Thrown when a handle is asked to move before the start of its data. */
export class HandlePositionError extends Error {
  constructor(readonly position: number) {
    super(`invalid handle position: ${position}`);
    this.name = "HandlePositionError";
  }
}
