import { Duration } from '../utils/duration';

/**
 * Source of time for token buckets.
 * The accounting core never reads a clock itself; the wrappers that
 * supply "now" and the waits go through this interface.
 */
export interface IClock {
  /**
   * Current instant in nanoseconds.
   * Only differences between instants matter, so the timeline may be monotonic.
   */
  now(): Duration;

  /**
   * Resolve once at least `duration` has elapsed
   * @param duration Time to suspend the caller for
   */
  sleep(duration: Duration): Promise<void>;
}
