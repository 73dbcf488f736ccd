import { INFINITY_DURATION } from './constants';

/**
 * A span of time, or an instant on a clock's timeline, in nanoseconds
 */
export type Duration = bigint;

/**
 * Token amounts accepted by the engine
 */
export type TokenAmount = bigint | number;

const NS_PER_MS = 1_000_000;

export function nanoseconds(value: number): Duration {
  return BigInt(Math.round(value));
}

export function microseconds(value: number): Duration {
  return BigInt(Math.round(value * 1_000));
}

export function milliseconds(value: number): Duration {
  return BigInt(Math.round(value * NS_PER_MS));
}

export function seconds(value: number): Duration {
  return BigInt(Math.round(value * 1_000_000_000));
}

/**
 * Convert a millisecond value to a Duration.
 * `Infinity` maps to INFINITY_DURATION, anything beyond it is clamped.
 */
export function fromMilliseconds(ms: number): Duration {
  if (Number.isNaN(ms)) {
    throw new RangeError('Duration in milliseconds must be a number');
  }
  if (ms === Infinity || ms * NS_PER_MS >= Number(INFINITY_DURATION)) {
    return INFINITY_DURATION;
  }
  if (ms === -Infinity || ms * NS_PER_MS <= -Number(INFINITY_DURATION)) {
    return -INFINITY_DURATION;
  }
  return milliseconds(ms);
}

/**
 * Convert a Duration to a (possibly fractional) number of milliseconds
 */
export function toMilliseconds(duration: Duration): number {
  const whole = duration / BigInt(NS_PER_MS);
  const rest = duration % BigInt(NS_PER_MS);
  return Number(whole) + Number(rest) / NS_PER_MS;
}

/**
 * Normalize a token amount to a bigint.
 * Numbers must be safe integers.
 */
export function toTokens(amount: TokenAmount): bigint {
  if (typeof amount === 'bigint') {
    return amount;
  }
  if (!Number.isSafeInteger(amount)) {
    throw new RangeError(`Token amount must be an integer, got ${amount}`);
  }
  return BigInt(amount);
}
