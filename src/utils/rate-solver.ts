import { INFINITY_DURATION, MAX_QUANTUM, RATE_MARGIN } from './constants';
import { Duration } from './duration';

export interface SolvedRate {
  fillInterval: Duration;
  quantum: bigint;
}

/**
 * Effective rate, in tokens per second, of a quantum added every fillInterval
 */
export function effectiveRate(quantum: bigint, fillInterval: Duration): number {
  return (1e9 * Number(quantum)) / Number(fillInterval);
}

function nextQuantum(quantum: number): number {
  const next = Math.floor((quantum * 11) / 10);
  return next === quantum ? next + 1 : next;
}

/**
 * Find a (fillInterval, quantum) pair whose rate is within RATE_MARGIN of
 * the requested one. High rates need more tokens per tick since the fill
 * interval cannot drop below one nanosecond.
 *
 * @param rate Tokens per second, must be positive and finite
 */
export function solveRate(rate: number): SolvedRate {
  if (!(rate > 0) || !Number.isFinite(rate)) {
    throw new Error('token bucket rate is not > 0');
  }

  for (let quantum = 1; quantum < MAX_QUANTUM; quantum = nextQuantum(quantum)) {
    const interval = Math.round((1e9 * quantum) / rate);
    if (interval <= 0 || interval >= Number(INFINITY_DURATION)) {
      continue;
    }

    const fillInterval = BigInt(interval);
    const candidate = BigInt(quantum);
    const diff = Math.abs(effectiveRate(candidate, fillInterval) - rate);
    if (diff / rate <= RATE_MARGIN) {
      return { fillInterval, quantum: candidate };
    }
  }

  throw new Error(`cannot find suitable quantum for ${rate}`);
}
