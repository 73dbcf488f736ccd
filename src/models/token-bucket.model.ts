import { IClock } from '../interfaces/clock.interface';
import {
  Reservation,
  TokenBucketParams,
} from '../interfaces/token-bucket.interface';
import { systemClock } from '../adapters/system-clock.adapter';
import { INFINITY_DURATION } from '../utils/constants';
import { Duration, TokenAmount, toTokens } from '../utils/duration';
import { effectiveRate, solveRate } from '../utils/rate-solver';

/**
 * Token bucket that fills with `quantum` tokens every `fillInterval`,
 * up to `capacity`.
 *
 * Tokens are never added by a timer. Every access works out how many
 * fill ticks have passed since the bucket was created and tops the
 * count up accordingly, so an idle bucket costs nothing.
 *
 * A reservation that cannot be served from the current tokens drives
 * the count negative. The debt is paid back by later ticks, and the
 * caller is told how long to wait for that to happen.
 */
export class TokenBucket {
  /**
   * Instant all ticks are counted from
   */
  readonly startTime: Duration;

  /**
   * Maximum number of tokens the bucket holds
   */
  readonly capacity: bigint;

  /**
   * Tokens added on each tick
   */
  readonly quantum: bigint;

  /**
   * Time between two ticks
   */
  readonly fillInterval: Duration;

  private availableTokens: bigint;
  private latestTick = 0n;

  constructor(
    params: TokenBucketParams,
    private readonly clock: IClock = systemClock,
  ) {
    if (params.fillInterval <= 0n) {
      throw new Error('token bucket fill interval is not > 0');
    }
    if (params.capacity <= 0n) {
      throw new Error('token bucket capacity is not > 0');
    }
    if (params.quantum <= 0n) {
      throw new Error('token bucket quantum is not > 0');
    }

    this.fillInterval = params.fillInterval;
    this.quantum = params.quantum;
    this.capacity = params.capacity;
    this.availableTokens = params.capacity;
    this.startTime = clock.now();
  }

  /**
   * Tokens per second this bucket lets through on average
   */
  rate(): number {
    return effectiveRate(this.quantum, this.fillInterval);
  }

  /**
   * Reserve `count` tokens, waiting as long as needed.
   * @returns How long the caller must wait before using them
   */
  take(count: TokenAmount): Duration {
    return this.reserve(this.clock.now(), count, INFINITY_DURATION).waitTime;
  }

  /**
   * Like take, but gives up without consuming anything when the wait
   * would exceed `maxWait`.
   */
  takeMaxDuration(count: TokenAmount, maxWait: Duration): Reservation {
    return this.reserve(this.clock.now(), count, maxWait);
  }

  /**
   * Take up to `count` tokens that are available right now
   * @returns Number of tokens actually taken
   */
  takeAvailable(count: TokenAmount): bigint {
    return this.consumeAvailable(this.clock.now(), count);
  }

  /**
   * Current token count. Negative while reserved tokens are still owed.
   */
  available(): bigint {
    return this.availableAt(this.clock.now());
  }

  /**
   * Reserve `count` tokens and resolve once they may be used
   */
  async wait(count: TokenAmount): Promise<void> {
    const waitTime = this.take(count);
    if (waitTime > 0n) {
      await this.clock.sleep(waitTime);
    }
  }

  /**
   * Reserve `count` tokens if that needs no more than `maxWait`, and
   * resolve once they may be used.
   * @returns False, immediately, when the wait would be too long
   */
  async waitMaxDuration(
    count: TokenAmount,
    maxWait: Duration,
  ): Promise<boolean> {
    const { waitTime, ok } = this.takeMaxDuration(count, maxWait);
    if (ok && waitTime > 0n) {
      await this.clock.sleep(waitTime);
    }
    return ok;
  }

  /**
   * Number of whole fill intervals between startTime and `now`
   */
  currentTick(now: Duration): bigint {
    return (now - this.startTime) / this.fillInterval;
  }

  /**
   * Token count as of `now`
   */
  availableAt(now: Duration): bigint {
    this.adjust(this.currentTick(now));
    return this.availableTokens;
  }

  /**
   * Reserve `count` tokens at instant `now`. When the wait exceeds
   * `maxWait` the bucket is left as it was.
   */
  reserve(now: Duration, amount: TokenAmount, maxWait: Duration): Reservation {
    const count = toTokens(amount);
    if (count <= 0n) {
      return { waitTime: 0n, ok: true };
    }

    const tick = this.currentTick(now);
    this.adjust(tick);

    const avail = this.availableTokens - count;
    if (avail >= 0n) {
      this.availableTokens = avail;
      return { waitTime: 0n, ok: true };
    }

    // Round up: a partial quantum still needs the whole tick
    const neededTicks = (-avail + this.quantum - 1n) / this.quantum;
    const endTime = this.startTime + (tick + neededTicks) * this.fillInterval;
    const waitTime = endTime - now;
    if (waitTime > maxWait) {
      return { waitTime: 0n, ok: false };
    }

    this.availableTokens = avail;
    return { waitTime, ok: true };
  }

  /**
   * Take up to `count` tokens available at `now`, never going into debt
   */
  consumeAvailable(now: Duration, amount: TokenAmount): bigint {
    const count = toTokens(amount);
    if (count <= 0n) {
      return 0n;
    }

    this.adjust(this.currentTick(now));
    if (this.availableTokens <= 0n) {
      return 0n;
    }

    const taken = count < this.availableTokens ? count : this.availableTokens;
    this.availableTokens -= taken;
    return taken;
  }

  /**
   * Bring availableTokens up to date with `tick`.
   * Ticks that pass while the bucket is full are dropped.
   */
  private adjust(tick: bigint): void {
    if (tick <= this.latestTick) {
      return;
    }

    const lastTick = this.latestTick;
    this.latestTick = tick;
    if (this.availableTokens >= this.capacity) {
      return;
    }

    this.availableTokens += (tick - lastTick) * this.quantum;
    if (this.availableTokens > this.capacity) {
      this.availableTokens = this.capacity;
    }
  }
}

/**
 * Bucket that fills one token every `fillInterval`
 *
 * @example
 * ```typescript
 * const bucket = newLimiter(milliseconds(250), 10);
 * await bucket.wait(1);
 * ```
 */
export function newLimiter(
  fillInterval: Duration,
  capacity: TokenAmount,
  clock?: IClock,
): TokenBucket {
  return newLimiterWithQuantum(fillInterval, 1, capacity, clock);
}

/**
 * Bucket that fills `quantum` tokens every `fillInterval`
 */
export function newLimiterWithQuantum(
  fillInterval: Duration,
  quantum: TokenAmount,
  capacity: TokenAmount,
  clock?: IClock,
): TokenBucket {
  return new TokenBucket(
    {
      fillInterval,
      quantum: toTokens(quantum),
      capacity: toTokens(capacity),
    },
    clock,
  );
}

/**
 * Bucket filling at roughly `rate` tokens per second (within 1%)
 */
export function newLimiterWithRate(
  rate: number,
  capacity: TokenAmount,
  clock?: IClock,
): TokenBucket {
  const tokens = toTokens(capacity);
  if (tokens <= 0n) {
    throw new Error('token bucket capacity is not > 0');
  }
  const { fillInterval, quantum } = solveRate(rate);
  return new TokenBucket({ fillInterval, quantum, capacity: tokens }, clock);
}
