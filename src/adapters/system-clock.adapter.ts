import { IClock } from '../interfaces/clock.interface';
import { MAX_TIMER_DELAY_MS } from '../utils/constants';
import { Duration } from '../utils/duration';

const NS_PER_MS = 1_000_000n;

/**
 * Clock backed by the process' monotonic high-resolution timer
 */
export class SystemClock implements IClock {
  now(): Duration {
    return process.hrtime.bigint();
  }

  /**
   * Sleep for at least the given duration, rounded up to whole milliseconds.
   * Delays longer than the timer limit are split into several timeouts.
   */
  async sleep(duration: Duration): Promise<void> {
    if (duration <= 0n) {
      await new Promise<void>((resolve) => setImmediate(resolve));
      return;
    }

    let remainingMs = (duration + NS_PER_MS - 1n) / NS_PER_MS;
    while (remainingMs > 0n) {
      const delayMs =
        remainingMs > BigInt(MAX_TIMER_DELAY_MS)
          ? MAX_TIMER_DELAY_MS
          : Number(remainingMs);
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
      remainingMs -= BigInt(delayMs);
    }
  }
}

export const systemClock = new SystemClock();
