/**
 * @file Transfer error types
 */
/* eslint-disable no-restricted-syntax -- error classes */
/** Base class for every error raised by the transfer file itself. */
export class TransferError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransferError";
  }
}

/** Thrown when a session is used after a later open or close replaced it. */
export class StaleSessionError extends TransferError {
  constructor() {
    super("transfer session is no longer active");
    this.name = "StaleSessionError";
  }
}

/** Thrown when an element size, count or length is not an integer. */
export class InvalidElementSizeError extends TransferError {
  constructor(what: string, value: number) {
    super(`${what} must be an integer, got ${value}`);
    this.name = "InvalidElementSizeError";
  }
}

/** Thrown when a write names more bytes than its source holds. */
export class SourceTooShortError extends TransferError {
  constructor(readonly needed: number, readonly available: number) {
    super(`write needs ${needed} bytes but source holds ${available}`);
    this.name = "SourceTooShortError";
  }
}

/** Thrown when a read target cannot hold the bytes being copied into it. */
export class TargetTooSmallError extends TransferError {
  constructor(readonly needed: number, readonly available: number) {
    super(`read needs ${needed} bytes of target space but only ${available} given`);
    this.name = "TargetTooSmallError";
  }
}

/** Reported when an open handle delivers fewer bytes than its slice spans. */
export class ShortHandleReadError extends TransferError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`short handle read: expected ${expected} bytes, got ${actual}`);
    this.name = "ShortHandleReadError";
  }
}

/** Reported when a handle slice would end before it starts. */
export class InvalidSliceError extends TransferError {
  constructor(readonly start: number, readonly end: number) {
    super(`slice end ${end} is before handle position ${start}`);
    this.name = "InvalidSliceError";
  }
}
