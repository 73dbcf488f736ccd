import { Duration } from '../utils/duration';

/**
 * Outcome of a reservation against a bucket
 */
export interface Reservation {
  /**
   * How long the caller must wait before the reserved tokens are usable.
   * Always 0 when `ok` is false.
   */
  waitTime: Duration;

  /**
   * False when the wait would have exceeded the caller's budget.
   * Nothing is consumed in that case.
   */
  ok: boolean;
}

/**
 * Canonical parameters a bucket is built from
 */
export interface TokenBucketParams {
  fillInterval: Duration;
  quantum: bigint;
  capacity: bigint;
}
