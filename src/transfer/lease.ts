/**
 * @file Session leases
 * Each open hands out a new lease and revokes the previous one, so a session
 * object kept past a reopen or close fails fast instead of reading a buffer
 * that now belongs to someone else.
 */
import { StaleSessionError } from "./errors";

export type SessionLease = {
  isLive(): boolean;
  /** Throws StaleSessionError once the lease has been superseded. */
  assertLive(): void;
};

export type LeaseIssuer = {
  issue(): SessionLease;
  revokeAll(): void;
};

/** Create an issuer whose leases are valid until the next `issue` or `revokeAll`. */
export function createLeaseIssuer(): LeaseIssuer {
  // eslint-disable-next-line no-restricted-syntax -- monotonically increasing generation
  let generation = 0;
  return {
    issue(): SessionLease {
      generation += 1;
      const mine = generation;
      const isLive = () => mine === generation;
      return {
        isLive,
        assertLive(): void {
          if (!isLive()) {
            throw new StaleSessionError();
          }
        },
      };
    },
    revokeAll(): void {
      generation += 1;
    },
  };
}
